/**
 * Payment Processor - Issuing Gateway Port
 * THE CARD RAIL: Abstract interface for virtual card providers
 *
 * The processor never talks to Stripe directly; it holds one IssuingGateway,
 * selected once at startup by selectAdapter().
 *
 * Implementations:
 * - MockIssuingAdapter (in-memory, never touches the network)
 * - StripeIssuingAdapter (Stripe Issuing + Top-ups)
 */

import {
  AdapterMode,
  Cardholder,
  CardholderInput,
  CardStatusChange,
  FundsLoad,
  IssueCardInput,
  LoadFundsInput,
  ReconcileOptions,
  TopupRecord,
  VirtualCard,
} from '../../shared/types';

export interface IssuingGateway {
  /**
   * Gateway identifier
   */
  readonly name: string;

  readonly mode: AdapterMode;

  createCardholder(input: CardholderInput): Promise<Cardholder>;

  issueVirtualCard(input: IssueCardInput): Promise<VirtualCard>;

  /**
   * Add funds for a card. The full amount moves in a single call.
   */
  loadFunds(input: LoadFundsInput): Promise<FundsLoad>;

  getCard(cardId: string): Promise<VirtualCard>;

  freezeCard(cardId: string): Promise<CardStatusChange>;

  unfreezeCard(cardId: string): Promise<CardStatusChange>;

  closeCard(cardId: string): Promise<CardStatusChange>;

  /**
   * List top-ups created since `since` and report the ones attributed to a card
   */
  reconcileTopups(options: ReconcileOptions): Promise<TopupRecord[]>;
}
