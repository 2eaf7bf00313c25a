/**
 * POS error codes, user-facing messages and the PosError class.
 * Every public operation either succeeds or throws a PosError naming the violated condition.
 */

// ============= ERROR CODES =============

export const POS_ERROR_CODES = {
  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_PAYMENT_METHOD: 'INVALID_PAYMENT_METHOD',
  AMBIGUOUS_CUSTOMER_REFERENCE: 'AMBIGUOUS_CUSTOMER_REFERENCE',
  DISCOUNT_EXCEEDS_TOTAL: 'DISCOUNT_EXCEEDS_TOTAL',

  // Lookup
  CUSTOMER_NOT_FOUND: 'CUSTOMER_NOT_FOUND',
  PRODUCT_NOT_FOUND: 'PRODUCT_NOT_FOUND',
  ORDER_LINE_NOT_FOUND: 'ORDER_LINE_NOT_FOUND',

  // State
  SYNC_IN_PROGRESS: 'SYNC_IN_PROGRESS',
  SIGNATURE_INVALID: 'SIGNATURE_INVALID',

  // Remote
  REMOTE_COMMIT_FAILED: 'REMOTE_COMMIT_FAILED',
  REMOTE_UNAVAILABLE: 'REMOTE_UNAVAILABLE',
} as const;

export type PosErrorCode = (typeof POS_ERROR_CODES)[keyof typeof POS_ERROR_CODES];

// ============= MESSAGES & STATUS =============

const POS_ERROR_MESSAGES: Record<PosErrorCode, string> = {
  [POS_ERROR_CODES.VALIDATION_ERROR]: 'The request is invalid',
  [POS_ERROR_CODES.INVALID_PAYMENT_METHOD]: "Invalid payment method. Must be 'cash' or 'pos'",
  [POS_ERROR_CODES.AMBIGUOUS_CUSTOMER_REFERENCE]: "Provide either 'email' or 'newCustomer', not both",
  [POS_ERROR_CODES.DISCOUNT_EXCEEDS_TOTAL]: 'Discount cannot be greater than or equal to the order total',
  [POS_ERROR_CODES.CUSTOMER_NOT_FOUND]: 'Customer not found',
  [POS_ERROR_CODES.PRODUCT_NOT_FOUND]: 'Product not found',
  [POS_ERROR_CODES.ORDER_LINE_NOT_FOUND]: 'Order not found',
  [POS_ERROR_CODES.SYNC_IN_PROGRESS]: 'A sync of this kind is already running',
  [POS_ERROR_CODES.SIGNATURE_INVALID]: 'Invalid webhook signature',
  [POS_ERROR_CODES.REMOTE_COMMIT_FAILED]: 'Failed to create the order in Shopify',
  [POS_ERROR_CODES.REMOTE_UNAVAILABLE]: 'Shopify is unavailable',
};

const POS_ERROR_STATUS: Record<PosErrorCode, number> = {
  [POS_ERROR_CODES.VALIDATION_ERROR]: 400,
  [POS_ERROR_CODES.INVALID_PAYMENT_METHOD]: 400,
  [POS_ERROR_CODES.AMBIGUOUS_CUSTOMER_REFERENCE]: 400,
  [POS_ERROR_CODES.DISCOUNT_EXCEEDS_TOTAL]: 400,
  [POS_ERROR_CODES.CUSTOMER_NOT_FOUND]: 404,
  [POS_ERROR_CODES.PRODUCT_NOT_FOUND]: 404,
  [POS_ERROR_CODES.ORDER_LINE_NOT_FOUND]: 404,
  [POS_ERROR_CODES.SYNC_IN_PROGRESS]: 409,
  [POS_ERROR_CODES.SIGNATURE_INVALID]: 401,
  [POS_ERROR_CODES.REMOTE_COMMIT_FAILED]: 502,
  [POS_ERROR_CODES.REMOTE_UNAVAILABLE]: 503,
};

// ============= ERROR CLASS =============

export interface PosErrorResult {
  success: false;
  error: {
    code: string;
    message: string;
  };
}

export class PosError extends Error {
  readonly code: PosErrorCode;
  readonly status: number;
  readonly context?: Record<string, unknown>;

  constructor(
    code: PosErrorCode,
    options?: {
      message?: string;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(options?.message || POS_ERROR_MESSAGES[code], { cause: options?.cause });
    this.name = 'PosError';
    this.code = code;
    this.status = POS_ERROR_STATUS[code];
    this.context = options?.context;
    Object.setPrototypeOf(this, PosError.prototype);
  }

  toResult(): PosErrorResult {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

export function isPosError(error: unknown, code?: PosErrorCode): error is PosError {
  return error instanceof PosError && (code === undefined || error.code === code);
}

/** Extract a useful message from any thrown value */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
