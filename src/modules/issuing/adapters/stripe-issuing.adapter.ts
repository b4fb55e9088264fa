/**
 * Payment Processor - Stripe Issuing Adapter
 * Live card rail via Stripe Issuing
 *
 * FUNDING MODEL:
 * Stripe Issuing cards have no per-card balance; they draw from the platform
 * Issuing balance. loadFunds() therefore creates a balance Top-up tagged with
 * metadata.card_id, and reconcileTopups() maps top-ups back to cards.
 */

import Stripe from 'stripe';
import { v4 as uuidv4 } from 'uuid';
import { STRIPE_API_VERSION } from '../../../config';
import { AdapterError } from '../../../shared/errors';
import {
  Cardholder,
  CardholderInput,
  CardStatus,
  CardStatusChange,
  FundsLoad,
  IssueCardInput,
  LoadFundsInput,
  ReconcileOptions,
  TopupRecord,
  VirtualCard,
} from '../../../shared/types';
import { IssuingGateway } from '../issuing.port';

export type StripeCardholderLike = Pick<Stripe.Issuing.Cardholder, 'id' | 'name' | 'email'>;

export type StripeCardLike = Pick<Stripe.Issuing.Card, 'id' | 'currency' | 'status' | 'last4'> & {
  readonly cardholder: Pick<Stripe.Issuing.Cardholder, 'id'>;
};

export type StripeTopupLike = Pick<Stripe.Topup, 'id' | 'amount' | 'currency' | 'status' | 'created' | 'metadata'>;

/**
 * The slice of the Stripe SDK this adapter calls
 */
export interface StripeIssuingClient {
  createCardholder(params: Stripe.Issuing.CardholderCreateParams): Promise<StripeCardholderLike>;
  createCard(params: Stripe.Issuing.CardCreateParams): Promise<StripeCardLike>;
  retrieveCard(cardId: string): Promise<StripeCardLike>;
  updateCardStatus(cardId: string, status: Stripe.Issuing.Card.Status): Promise<StripeCardLike>;
  createTopup(params: Stripe.TopupCreateParams, idempotencyKey: string): Promise<StripeTopupLike>;
  listTopups(params: Stripe.TopupListParams): AsyncIterable<StripeTopupLike>;
}

export function createStripeIssuingClient(stripe: Stripe): StripeIssuingClient {
  return {
    createCardholder: (params) => stripe.issuing.cardholders.create(params),
    createCard: (params) => stripe.issuing.cards.create(params),
    retrieveCard: (cardId) => stripe.issuing.cards.retrieve(cardId),
    updateCardStatus: (cardId, status) => stripe.issuing.cards.update(cardId, { status }),
    createTopup: (params, idempotencyKey) => stripe.topups.create(params, { idempotencyKey }),
    listTopups: (params) => stripe.topups.list(params),
  };
}

export interface StripeIssuingAdapterOptions {
  readonly apiKey: string;
  readonly defaultCurrency?: string;
  readonly client?: StripeIssuingClient;
}

const STATUS_FROM_STRIPE: Record<Stripe.Issuing.Card.Status, CardStatus> = {
  active: 'active',
  inactive: 'frozen',
  canceled: 'closed',
};

export class StripeIssuingAdapter implements IssuingGateway {
  readonly name = 'STRIPE_ISSUING';
  readonly mode = 'live' as const;

  private readonly client: StripeIssuingClient;
  private readonly defaultCurrency: string;

  constructor(options: StripeIssuingAdapterOptions) {
    this.client =
      options.client ??
      createStripeIssuingClient(
        new Stripe(options.apiKey, {
          apiVersion: STRIPE_API_VERSION,
          appInfo: { name: 'payment-processor' },
        })
      );
    this.defaultCurrency = (options.defaultCurrency ?? 'usd').toLowerCase();
  }

  async createCardholder(input: CardholderInput): Promise<Cardholder> {
    if (!input.billing) {
      throw new AdapterError('Stripe Issuing requires a billing address for cardholders', 'BILLING_REQUIRED');
    }

    const params: Stripe.Issuing.CardholderCreateParams = {
      type: 'individual',
      name: input.name,
      billing: {
        address: {
          line1: input.billing.line1,
          line2: input.billing.line2,
          city: input.billing.city,
          state: input.billing.state,
          postal_code: input.billing.postal_code,
          country: input.billing.country,
        },
      },
    };
    if (input.email) {
      params.email = input.email;
    }

    const cardholder = await this.call('createCardholder', () => this.client.createCardholder(params));
    console.log(`[StripeIssuing] Cardholder created: ${cardholder.id}`);

    return {
      id: cardholder.id,
      name: cardholder.name,
      email: cardholder.email,
    };
  }

  async issueVirtualCard(input: IssueCardInput): Promise<VirtualCard> {
    // initialBalanceCents has no Stripe equivalent: fund through loadFunds()
    const card = await this.call('issueVirtualCard', () =>
      this.client.createCard({
        cardholder: input.cardholderId,
        type: 'virtual',
        currency: (input.currency ?? this.defaultCurrency).toLowerCase(),
      })
    );
    console.log(`[StripeIssuing] Virtual card issued: ${card.id}`);

    return toVirtualCard(card);
  }

  async loadFunds(input: LoadFundsInput): Promise<FundsLoad> {
    const currency = (input.currency ?? this.defaultCurrency).toLowerCase();
    const idempotencyKey = `topup_${input.cardId}_${uuidv4()}`;

    const topup = await this.call('loadFunds', () =>
      this.client.createTopup(
        {
          amount: input.amountCents,
          currency,
          description: input.description ?? `Issuing top-up for card ${input.cardId}`,
          metadata: { card_id: input.cardId },
        },
        idempotencyKey
      )
    );
    console.log(`[StripeIssuing] Top-up created: ${topup.id} (${topup.amount} ${topup.currency})`);

    return {
      id: input.cardId,
      topup_id: topup.id,
      amount_cents: topup.amount,
      currency: topup.currency,
      balance_cents: null,
      status: topup.status,
    };
  }

  async getCard(cardId: string): Promise<VirtualCard> {
    const card = await this.call('getCard', () => this.client.retrieveCard(cardId));
    return toVirtualCard(card);
  }

  async freezeCard(cardId: string): Promise<CardStatusChange> {
    return this.updateStatus(cardId, 'inactive');
  }

  async unfreezeCard(cardId: string): Promise<CardStatusChange> {
    return this.updateStatus(cardId, 'active');
  }

  async closeCard(cardId: string): Promise<CardStatusChange> {
    return this.updateStatus(cardId, 'canceled');
  }

  async reconcileTopups(options: ReconcileOptions): Promise<TopupRecord[]> {
    const records: TopupRecord[] = [];

    await this.call('reconcileTopups', async () => {
      for await (const topup of this.client.listTopups({ created: { gte: options.since }, limit: 100 })) {
        records.push(toTopupRecord(topup));
      }
    });

    for (const record of records) {
      if (record.card_id && options.updateFn) {
        await options.updateFn(record.card_id, record.amount_cents, record.id);
      }
    }

    console.log(`[StripeIssuing] Reconciled ${records.length} top-ups since ${options.since}`);
    return records;
  }

  private async updateStatus(cardId: string, status: Stripe.Issuing.Card.Status): Promise<CardStatusChange> {
    const card = await this.call('updateStatus', () => this.client.updateCardStatus(cardId, status));
    console.log(`[StripeIssuing] Card ${card.id} -> ${card.status}`);

    return { id: card.id, status: STATUS_FROM_STRIPE[card.status] };
  }

  /**
   * Run an SDK call, converting failures into AdapterError
   */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AdapterError) {
        throw error;
      }

      if (error instanceof Stripe.errors.StripeError) {
        const retryable =
          error instanceof Stripe.errors.StripeConnectionError ||
          error instanceof Stripe.errors.StripeRateLimitError;
        console.error(`[StripeIssuing] ${operation} failed:`, error.message);
        throw new AdapterError(error.message, error.code ?? 'STRIPE_ERROR', retryable, { cause: error });
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[StripeIssuing] ${operation} failed:`, message);
      throw new AdapterError(message, 'STRIPE_ERROR', false, { cause: error });
    }
  }
}

function toVirtualCard(card: StripeCardLike): VirtualCard {
  return {
    id: card.id,
    cardholder_id: card.cardholder.id,
    currency: card.currency.toUpperCase(),
    balance_cents: null,
    status: STATUS_FROM_STRIPE[card.status],
    last4: card.last4,
  };
}

function toTopupRecord(topup: StripeTopupLike): TopupRecord {
  return {
    id: topup.id,
    amount_cents: topup.amount,
    currency: topup.currency,
    status: topup.status,
    created: topup.created,
    card_id: topup.metadata?.card_id ?? null,
  };
}
