/**
 * Payment Processor - Mock Issuing Adapter
 * In-memory cardholders, virtual prepaid cards and top-ups.
 *
 * DESIGN:
 * - Never contacts the network
 * - Cards carry a real balance (unlike Stripe Issuing)
 * - Top-ups are recorded so reconcileTopups() behaves like the live adapter
 */

import { v4 as uuidv4 } from 'uuid';
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

export interface MockIssuingOptions {
  /**
   * Clock in unix seconds, used to stamp top-ups
   */
  readonly now?: () => number;
}

interface MutableCard {
  id: string;
  cardholder_id: string;
  currency: string;
  balance_cents: number;
  status: CardStatus;
  last4: string;
}

function shortId(prefix: string): string {
  return `${prefix}_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

export class MockIssuingAdapter implements IssuingGateway {
  readonly name = 'ISSUING_MOCK';
  readonly mode = 'mock' as const;

  private readonly cardholders: Map<string, Cardholder> = new Map();
  private readonly cards: Map<string, MutableCard> = new Map();
  private readonly topups: TopupRecord[] = [];
  private readonly now: () => number;

  constructor(options: MockIssuingOptions = {}) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    console.log('[ISSUING MOCK] Adapter initialized (no network, no real funds)');
  }

  async createCardholder(input: CardholderInput): Promise<Cardholder> {
    const cardholder: Cardholder = {
      id: shortId('ich'),
      name: input.name,
      email: input.email ?? null,
    };
    this.cardholders.set(cardholder.id, cardholder);

    console.log(`[ISSUING MOCK] Cardholder created: ${cardholder.id}`);
    return { ...cardholder };
  }

  async issueVirtualCard(input: IssueCardInput): Promise<VirtualCard> {
    if (!this.cardholders.has(input.cardholderId)) {
      throw new AdapterError(`cardholder not found: ${input.cardholderId}`, 'CARDHOLDER_NOT_FOUND');
    }

    const card: MutableCard = {
      id: shortId('vc'),
      cardholder_id: input.cardholderId,
      currency: (input.currency ?? 'USD').toUpperCase(),
      balance_cents: input.initialBalanceCents ?? 0,
      status: 'active',
      last4: String(Math.floor(Math.random() * 10_000)).padStart(4, '0'),
    };
    this.cards.set(card.id, card);

    console.log(`[ISSUING MOCK] Virtual card issued: ${card.id} (${card.balance_cents} ${card.currency} cents)`);
    return { ...card };
  }

  async loadFunds(input: LoadFundsInput): Promise<FundsLoad> {
    const card = this.requireCard(input.cardId);

    if (!Number.isInteger(input.amountCents) || input.amountCents <= 0) {
      throw new AdapterError('amount must be > 0', 'INVALID_AMOUNT');
    }
    if (card.status === 'closed') {
      throw new AdapterError(`card is closed: ${card.id}`, 'CARD_CLOSED');
    }

    card.balance_cents += input.amountCents;

    const currency = (input.currency ?? card.currency).toLowerCase();
    const topup: TopupRecord = {
      id: shortId('tu'),
      amount_cents: input.amountCents,
      currency,
      status: 'succeeded',
      created: this.now(),
      card_id: card.id,
    };
    this.topups.push(topup);

    console.log(`[ISSUING MOCK] Loaded ${input.amountCents} cents onto ${card.id}. Balance: ${card.balance_cents}`);

    return {
      id: card.id,
      topup_id: topup.id,
      amount_cents: input.amountCents,
      currency,
      balance_cents: card.balance_cents,
      status: topup.status,
    };
  }

  async getCard(cardId: string): Promise<VirtualCard> {
    return { ...this.requireCard(cardId) };
  }

  async freezeCard(cardId: string): Promise<CardStatusChange> {
    return this.setStatus(cardId, 'frozen');
  }

  async unfreezeCard(cardId: string): Promise<CardStatusChange> {
    return this.setStatus(cardId, 'active');
  }

  async closeCard(cardId: string): Promise<CardStatusChange> {
    return this.setStatus(cardId, 'closed');
  }

  async reconcileTopups(options: ReconcileOptions): Promise<TopupRecord[]> {
    const matched = this.topups.filter((topup) => topup.created >= options.since);

    for (const topup of matched) {
      if (topup.card_id && options.updateFn) {
        await options.updateFn(topup.card_id, topup.amount_cents, topup.id);
      }
    }

    return matched.map((topup) => ({ ...topup }));
  }

  /**
   * Record a top-up that is not attributed to any card (testing)
   */
  recordUnattributedTopup(amountCents: number, currency: string = 'usd'): TopupRecord {
    const topup: TopupRecord = {
      id: shortId('tu'),
      amount_cents: amountCents,
      currency,
      status: 'succeeded',
      created: this.now(),
      card_id: null,
    };
    this.topups.push(topup);
    return { ...topup };
  }

  private setStatus(cardId: string, status: CardStatus): CardStatusChange {
    const card = this.requireCard(cardId);
    card.status = status;

    console.log(`[ISSUING MOCK] Card ${cardId} -> ${status}`);
    return { id: cardId, status };
  }

  private requireCard(cardId: string): MutableCard {
    const card = this.cards.get(cardId);
    if (!card) {
      throw new AdapterError(`card not found: ${cardId}`, 'CARD_NOT_FOUND');
    }
    return card;
  }
}
