export interface ErrorIssue {
  path: string;
  message: string;
}

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every failure the inventory core reports on purpose.
 * Each subclass carries a stable `code` and the HTTP status it maps to, so the
 * API layer never has to inspect messages.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): ErrorBody {
    return Object.keys(this.details).length > 0
      ? { error: this.code, message: this.message, details: this.details }
      : { error: this.code, message: this.message };
  }
}

export class ValidationError extends DomainError {
  readonly code = "VALIDATION_FAILED";
  readonly status = 400;

  constructor(readonly issues: ErrorIssue[]) {
    super(
      issues.length > 0
        ? `Invalid input: ${issues.map((issue) => `${issue.path || "(root)"} ${issue.message}`).join("; ")}`
        : "Invalid input",
      { issues },
    );
  }
}

export class InvalidQuantityError extends DomainError {
  readonly code = "INVALID_QUANTITY";
  readonly status = 400;

  constructor(
    readonly quantity: number,
    readonly productId?: number,
  ) {
    super(
      productId === undefined
        ? `Invalid quantity ${quantity}`
        : `Invalid quantity ${quantity} for product ${productId}`,
      productId === undefined ? { quantity } : { quantity, productId },
    );
  }
}

export class EmptySaleError extends DomainError {
  readonly code = "EMPTY_SALE";
  readonly status = 400;

  constructor() {
    super("A sale must contain at least one product");
  }
}

export class UnauthenticatedError extends DomainError {
  readonly code = "UNAUTHENTICATED";
  readonly status = 401;

  constructor() {
    super("No authenticated actor on the request");
  }
}

export class ForbiddenError extends DomainError {
  readonly code = "FORBIDDEN";
  readonly status = 403;

  constructor(
    readonly username: string,
    readonly permission: string,
  ) {
    super(`User ${username} is not allowed to perform ${permission}`, {
      username,
      permission,
    });
  }
}

export class UnknownProductError extends DomainError {
  readonly code = "UNKNOWN_PRODUCT";
  readonly status = 404;

  constructor(readonly productId: number) {
    super(`Product ${productId} does not exist`, { productId });
  }
}

export class UnknownCustomerError extends DomainError {
  readonly code = "UNKNOWN_CUSTOMER";
  readonly status = 404;

  constructor(readonly customerId: number) {
    super(`Customer ${customerId} does not exist`, { customerId });
  }
}

export class UnknownSaleError extends DomainError {
  readonly code = "UNKNOWN_SALE";
  readonly status = 404;

  constructor(readonly saleId: number) {
    super(`Sale ${saleId} does not exist`, { saleId });
  }
}

export class InsufficientStockError extends DomainError {
  readonly code = "INSUFFICIENT_STOCK";
  readonly status = 409;

  constructor(
    readonly productId: number,
    readonly productName: string,
    readonly available: number,
    readonly requested: number,
  ) {
    super(
      `Only ${available} units of ${productName} available, ${requested} requested`,
      { productId, productName, available, requested },
    );
  }
}

export class ProductInUseError extends DomainError {
  readonly code = "PRODUCT_IN_USE";
  readonly status = 409;

  constructor(readonly productId: number) {
    super(`Product ${productId} appears on recorded sales and cannot be deleted`, {
      productId,
    });
  }
}

export class CustomerHasSalesError extends DomainError {
  readonly code = "CUSTOMER_HAS_SALES";
  readonly status = 409;

  constructor(readonly customerId: number) {
    super(`Customer ${customerId} has recorded sales and cannot be deleted`, {
      customerId,
    });
  }
}

export class ConcurrentUpdateConflictError extends DomainError {
  readonly code = "CONCURRENT_UPDATE_CONFLICT";
  readonly status = 409;

  constructor(operation: string) {
    super(`Another update was in progress during ${operation}; retry the request`, {
      operation,
      retryable: true,
    });
  }
}
