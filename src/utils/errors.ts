export class CustomError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CustomError {
  constructor(message = 'Not found') {
    super(message, 404);
  }
}

export class InvalidParentError extends NotFoundError {
  constructor(public readonly parentId: string) {
    super(`Parent message ${parentId} does not exist`);
  }
}

export class PermissionError extends CustomError {
  constructor(message = 'Not authorized to perform this action') {
    super(message, 403);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends CustomError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(message, 400);
  }
}

export class AuthenticationError extends CustomError {
  constructor(message = 'Unauthorized') {
    super(message, 401);
  }
}
