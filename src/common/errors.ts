/**
 * Common call contracts: registration error types
 */

export class InvalidArgumentError extends Error {
  readonly code = 'INVALID_ARGUMENT';
  constructor(message = 'Path not specified') {
    super(message);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

export class InvalidRouteError extends Error {
  readonly code = 'INVALID_ROUTE';
  readonly path: string;
  constructor(path: string, message = 'Prefix path cannot end with /') {
    super(`${message}: ${JSON.stringify(path)}`);
    this.name = 'InvalidRouteError';
    this.path = path;
    Object.setPrototypeOf(this, InvalidRouteError.prototype);
  }
}
