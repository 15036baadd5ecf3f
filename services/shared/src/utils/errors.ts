// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400,
          public readonly details?: Record<string, unknown>
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ValidationError extends DomainError {
     constructor(
          message: string,
          code: string = 'VALIDATION_ERROR',
          details?: Record<string, unknown>
     ) {
          super(message, code, 400, details);
     }
}

export class EmptyInvoiceError extends ValidationError {
     constructor(message: string = 'Invoice must have at least one line') {
          super(message, 'EMPTY_INVOICE');
     }
}

export class InvalidQuantityError extends ValidationError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY');
     }
}

export class InvalidCustomerError extends ValidationError {
     constructor(message: string) {
          super(message, 'INVALID_CUSTOMER');
     }
}

export class UnknownProductError extends ValidationError {
     constructor(
          public readonly productName: string,
          public readonly weight: string
     ) {
          super(`Product ${describe(productName, weight)} not found`, 'UNKNOWN_PRODUCT', {
               productName,
               weight,
          });
     }
}

export class ProductNotFoundError extends DomainError {
     constructor(
          public readonly productName: string,
          public readonly weight: string
     ) {
          super(`Product ${describe(productName, weight)} not found`, 'PRODUCT_NOT_FOUND', 404, {
               productName,
               weight,
          });
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly productName: string,
          public readonly weight: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for ${describe(productName, weight)}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409,
               { productName, weight, requested, available }
          );
     }
}

export class InsufficientDamagedStockError extends DomainError {
     constructor(
          public readonly productName: string,
          public readonly weight: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient damaged stock for ${describe(productName, weight)}: requested ${requested}, damaged ${available}`,
               'INSUFFICIENT_DAMAGED_STOCK',
               409,
               { productName, weight, requested, available }
          );
     }
}

export class DuplicateProductError extends DomainError {
     constructor(
          public readonly productName: string,
          public readonly weight: string
     ) {
          super(`Product ${describe(productName, weight)} already exists`, 'DUPLICATE_PRODUCT', 409, {
               productName,
               weight,
          });
     }
}

export class ProductInUseError extends DomainError {
     constructor(
          public readonly productName: string,
          public readonly weight: string
     ) {
          super(
               `Product ${describe(productName, weight)} is referenced by invoices and cannot be removed`,
               'PRODUCT_IN_USE',
               409,
               { productName, weight }
          );
     }
}

export class InvoiceNotFoundError extends DomainError {
     constructor(public readonly invoiceNumber: number) {
          super(`Invoice ${invoiceNumber} not found`, 'INVOICE_NOT_FOUND', 404);
     }
}

export class InvoiceAlreadyVoidedError extends DomainError {
     constructor(public readonly invoiceNumber: number) {
          super(`Invoice ${invoiceNumber} is already voided`, 'INVOICE_ALREADY_VOIDED', 409);
     }
}

export class ConflictError extends DomainError {
     constructor(message: string = 'Concurrent update conflict, please retry') {
          super(message, 'CONFLICT', 409);
     }
}

export class PersistenceError extends DomainError {
     constructor(
          message: string,
          public readonly reason?: string
     ) {
          super(message, 'PERSISTENCE_FAILURE', 503);
     }
}

function describe(productName: string, weight: string): string {
     return weight ? `"${productName} (${weight})"` : `"${productName}"`;
}
