import { errorMessage } from './util.js';

/** A connection definition is invalid, or a connection name is unknown */
export class ConnectionConfigError extends Error {
  constructor(message: string, readonly connection?: string) {
    super(message);
    this.name = 'ConnectionConfigError';
  }
}

/** Listing tools from one connection failed; fails the whole catalog fetch */
export class CatalogFetchError extends Error {
  constructor(readonly connection: string, cause: unknown) {
    super(`failed to fetch tools from '${connection}': ${errorMessage(cause)}`, { cause });
    this.name = 'CatalogFetchError';
  }
}

/** A remote tool answered with isError set */
export class ToolCallError extends Error {
  constructor(readonly toolName: string, message: string) {
    super(message);
    this.name = 'ToolCallError';
  }
}

/** Process-boundary configuration is missing or malformed */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
