export class ErrorResponse extends Error {
  code: number;
  details?: string;

  constructor(code: number, message: string, details?: string) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

/**
 * Raised when a ride category is not one of economy, luxury or pool.
 * `category` keeps the caller's input exactly as it was passed in.
 */
export class InvalidRideCategoryError extends ErrorResponse {
  category: string;

  constructor(category: string) {
    super(400, `Invalid ride type: ${category}`);
    this.category = category;
  }
}

export class DriverNotAvailableError extends ErrorResponse {
  constructor(driverName: string) {
    super(409, `Driver ${driverName} is not available`);
  }
}
