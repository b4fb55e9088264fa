/**
 * Payment Processor - Issuing Types
 * Virtual prepaid cards, cardholders and balance top-ups
 */

export type AdapterMode = 'mock' | 'live';

export type CardStatus = 'active' | 'frozen' | 'closed';

export interface BillingAddress {
  readonly line1: string;
  readonly line2?: string;
  readonly city: string;
  readonly state?: string;
  readonly postal_code: string;
  readonly country: string;           // ISO 3166-1 alpha-2
}

export interface CardholderInput {
  readonly name: string;
  readonly email?: string;
  readonly billing?: BillingAddress;  // Required by Stripe Issuing
}

export interface Cardholder {
  readonly id: string;
  readonly name: string;
  readonly email: string | null;
}

export interface IssueCardInput {
  readonly cardholderId: string;
  readonly currency?: string;
  readonly initialBalanceCents?: number;
}

export interface VirtualCard {
  readonly id: string;
  readonly cardholder_id: string;
  readonly currency: string;
  readonly balance_cents: number | null; // null: provider does not hold per-card balances
  readonly status: CardStatus;
  readonly last4?: string;
}

export interface CardStatusChange {
  readonly id: string;
  readonly status: CardStatus;
}

export interface LoadFundsInput {
  readonly cardId: string;
  readonly amountCents: number;
  readonly currency?: string;
  readonly description?: string;
}

export interface FundsLoad {
  readonly id: string;                // Card id
  readonly topup_id: string;
  readonly amount_cents: number;
  readonly currency: string;
  readonly balance_cents: number | null;
  readonly status: string;
}

export interface TopupRecord {
  readonly id: string;
  readonly amount_cents: number;
  readonly currency: string;
  readonly status: string;
  readonly created: number;           // Unix seconds
  readonly card_id: string | null;
}

/**
 * Called once per reconciled top-up that is attributed to a card
 */
export type TopupUpdateFn = (cardId: string, amountCents: number, topupId: string) => void | Promise<void>;

export interface ReconcileOptions {
  readonly since: number;             // Unix seconds, inclusive
  readonly updateFn?: TopupUpdateFn;
}
