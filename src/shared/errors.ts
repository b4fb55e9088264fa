/**
 * Payment Processor - Error Taxonomy
 *
 * PaymentError          - invalid request to a processor (bad amount, missing id)
 * AdapterError          - failure inside a gateway implementation (mock or provider)
 * ConfigurationError    - unsafe or inconsistent configuration; always fatal
 */

export class PaymentError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'PAYMENT_ERROR'
  ) {
    super(message);
    this.name = 'PaymentError';
  }
}

/**
 * AdapterError - Thrown by gateway implementations
 */
export class AdapterError extends PaymentError {
  constructor(
    message: string,
    code: string = 'ADAPTER_ERROR',
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, code);
    this.name = 'AdapterError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * ConfigurationError - Live mode with a test credential, non-positive top-up, etc.
 * Never caught to fall back to the mock adapter.
 */
export class ConfigurationError extends PaymentError {
  constructor(message: string, code: string = 'CONFIGURATION_ERROR') {
    super(message, code);
    this.name = 'ConfigurationError';
  }
}
