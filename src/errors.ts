import type { Position } from './syntax/types';

export class PmcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The tree handed to the engine does not have the shape its kind promises. */
export class MalformedTreeError extends PmcError {
  readonly position: Position;

  constructor(message: string, position: Position) {
    super(`${message} (${position.line}:${position.column})`);
    this.position = position;
  }
}

export class ConfigError extends PmcError {
  readonly configPath: string;

  constructor(message: string, configPath: string) {
    super(`${configPath}: ${message}`);
    this.configPath = configPath;
  }
}
