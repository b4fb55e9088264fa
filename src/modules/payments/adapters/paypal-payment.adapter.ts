/**
 * Payment Processor - PayPal Payment Adapter
 * Orders API (create + capture), refunds on captures, webhook verification
 *
 * AUTH: OAuth2 client-credentials; the access token is cached until
 * 10 seconds before it expires.
 */

import axios, { AxiosInstance, Method } from 'axios';
import { z } from 'zod';
import { AdapterError } from '../../../shared/errors';
import {
  ChargeInput,
  ChargeRecord,
  PayPalSignatureHeaders,
  RefundRecord,
} from '../../../shared/types';
import { PaymentGateway, WebhookSignature } from '../payment.port';

export const PAYPAL_SANDBOX_BASE_URL = 'https://api-m.sandbox.paypal.com';
export const PAYPAL_LIVE_BASE_URL = 'https://api-m.paypal.com';

const TOKEN_EXPIRY_MARGIN_MS = 10_000;
const DEFAULT_TOKEN_TTL_SECONDS = 300;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const OrderResponseSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

const CaptureResponseSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    purchase_units: z
      .array(
        z
          .object({
            payments: z
              .object({
                captures: z.array(z.object({ id: z.string() }).passthrough()).optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const RefundResponseSchema = z
  .object({
    id: z.string().optional(),
    status: z.string().optional(),
    amount: z.object({ value: z.string() }).passthrough().optional(),
  })
  .passthrough();

const VerifyResponseSchema = z.object({
  verification_status: z.string(),
});

export interface PayPalPaymentAdapterOptions {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly sandbox?: boolean;
  readonly timeoutMs?: number;
  /**
   * Currency for refunds on captures this instance did not create
   */
  readonly defaultCurrency?: string;
  readonly http?: AxiosInstance;
  /**
   * Clock in milliseconds, used for token expiry
   */
  readonly now?: () => number;
}

/**
 * 1234 -> "12.34"
 */
export function formatCents(amountCents: number): string {
  const whole = Math.floor(amountCents / 100);
  const fraction = String(amountCents % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}

function parseCents(value: string): number {
  const [whole, fraction = ''] = value.split('.');
  return parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0').slice(0, 2), 10);
}

export class PayPalPaymentAdapter implements PaymentGateway {
  readonly name = 'PAYPAL';

  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private token: string | null = null;
  private tokenExpiresAt = 0;
  private readonly captureCurrencies: Map<string, string> = new Map();

  constructor(private readonly options: PayPalPaymentAdapterOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
    this.now = options.now ?? Date.now;
  }

  get baseUrl(): string {
    return this.options.sandbox === false ? PAYPAL_LIVE_BASE_URL : PAYPAL_SANDBOX_BASE_URL;
  }

  /**
   * Captures immediately after creating the order
   */
  async charge(input: ChargeInput): Promise<ChargeRecord> {
    const order = await this.request('POST', '/v2/checkout/orders', OrderResponseSchema, {
      intent: 'CAPTURE',
      purchase_units: [
        {
          amount: { currency_code: input.currency.toUpperCase(), value: formatCents(input.amountCents) },
          description: input.description ?? '',
        },
      ],
    });

    if (!order.id) {
      throw new AdapterError('paypal: no order id returned', 'PAYPAL_NO_ORDER_ID');
    }

    const capture = await this.request('POST', `/v2/checkout/orders/${order.id}/capture`, CaptureResponseSchema, {});
    const captureId = capture.purchase_units?.[0]?.payments?.captures?.[0]?.id ?? order.id;

    this.captureCurrencies.set(captureId, input.currency.toUpperCase());
    console.log(`[PayPal] Order ${order.id} captured (${captureId})`);

    return {
      id: captureId,
      amount_cents: input.amountCents,
      currency: input.currency.toUpperCase(),
      source: input.source,
      description: input.description ?? '',
      status: capture.status === 'COMPLETED' ? 'succeeded' : 'pending',
      refunded_cents: 0,
      raw_response: { order, capture },
    };
  }

  /**
   * @param chargeId - PayPal capture id
   */
  async refund(chargeId: string, amountCents?: number): Promise<RefundRecord> {
    const currency = this.captureCurrencies.get(chargeId) ?? (this.options.defaultCurrency ?? 'USD').toUpperCase();
    const body =
      amountCents !== undefined ? { amount: { value: formatCents(amountCents), currency_code: currency } } : {};
    const refund = await this.request('POST', `/v2/payments/captures/${chargeId}/refund`, RefundResponseSchema, body);

    const refundedCents = refund.amount ? parseCents(refund.amount.value) : amountCents ?? 0;
    console.log(`[PayPal] Refund ${refund.id ?? '(no id)'} on capture ${chargeId}: ${refund.status ?? 'UNKNOWN'}`);

    return {
      id: chargeId,
      refunded_cents: refundedCents,
      status: refund.status === 'COMPLETED' ? 'refunded' : 'pending',
      raw_response: refund,
    };
  }

  /**
   * @param secret - the PayPal webhook id
   */
  async verifyWebhook(payload: string | Buffer, signature: WebhookSignature, secret: string): Promise<boolean> {
    if (typeof signature === 'string') {
      return false;
    }
    return this.verifyWebhookHeaders(payload, signature, secret);
  }

  async verifyWebhookHeaders(
    payload: string | Buffer,
    headers: PayPalSignatureHeaders,
    webhookId: string
  ): Promise<boolean> {
    let event: unknown;
    try {
      event = JSON.parse(payload.toString());
    } catch {
      console.warn('[PayPal] Webhook payload is not JSON');
      return false;
    }

    const token = await this.getAccessToken();

    try {
      const response = await this.http.request({
        method: 'POST',
        url: `${this.baseUrl}/v1/notifications/verify-webhook-signature`,
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
        data: {
          transmission_id: headers['paypal-transmission-id'],
          transmission_time: headers['paypal-transmission-time'],
          cert_url: headers['paypal-cert-url'],
          auth_algo: headers['paypal-auth-algo'],
          transmission_sig: headers['paypal-transmission-sig'],
          webhook_id: webhookId,
          webhook_event: event,
        },
      });

      const parsed = VerifyResponseSchema.safeParse(response.data);
      return parsed.success && parsed.data.verification_status === 'SUCCESS';
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        console.warn(`[PayPal] Webhook verification rejected: ${error.response.status}`);
        return false;
      }
      throw toAdapterError(error);
    }
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && this.now() < this.tokenExpiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return this.token;
    }

    try {
      const response = await this.http.request({
        method: 'POST',
        url: `${this.baseUrl}/v1/oauth2/token`,
        auth: { username: this.options.clientId, password: this.options.clientSecret },
        headers: {
          Accept: 'application/json',
          'Accept-Language': 'en_US',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        data: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      });

      const body = TokenResponseSchema.parse(response.data);
      this.token = body.access_token;
      this.tokenExpiresAt = this.now() + (body.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS) * 1000;
      return this.token;
    } catch (error) {
      throw toAdapterError(error, 'paypal token error');
    }
  }

  private async request<S extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: S,
    data: unknown
  ): Promise<z.infer<S>> {
    const token = await this.getAccessToken();

    try {
      const response = await this.http.request({
        method,
        url: `${this.baseUrl}${path}`,
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
        data,
      });
      return schema.parse(response.data);
    } catch (error) {
      throw toAdapterError(error);
    }
  }
}

function toAdapterError(error: unknown, prefix: string = 'paypal api error'): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      const retryable = status === 429 || status >= 500;
      return new AdapterError(
        `${prefix}: ${status} ${JSON.stringify(error.response.data)}`,
        'PAYPAL_HTTP_ERROR',
        retryable,
        { cause: error }
      );
    }
    return new AdapterError(`${prefix}: ${error.message}`, 'PAYPAL_NETWORK_ERROR', true, { cause: error });
  }

  if (error instanceof z.ZodError) {
    return new AdapterError(`${prefix}: unexpected response shape`, 'PAYPAL_BAD_RESPONSE', false, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AdapterError(`${prefix}: ${message}`, 'PAYPAL_ERROR', false, { cause: error });
}
