/**
 * Payment Processor - Issuing Service
 * Validating wrapper around the selected IssuingGateway
 */

import { PaymentError } from '../../shared/errors';
import {
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
import { IssuingGateway } from './issuing.port';

export class IssuingProcessor {
  constructor(private readonly gateway: IssuingGateway) {}

  get mode(): IssuingGateway['mode'] {
    return this.gateway.mode;
  }

  get gatewayName(): string {
    return this.gateway.name;
  }

  async createCardholder(input: CardholderInput): Promise<Cardholder> {
    if (!input.name || !input.name.trim()) {
      throw new PaymentError('name required', 'NAME_REQUIRED');
    }
    return this.gateway.createCardholder({ ...input, name: input.name.trim() });
  }

  async issueVirtualCard(input: IssueCardInput): Promise<VirtualCard> {
    if (!input.cardholderId) {
      throw new PaymentError('cardholder_id required', 'CARDHOLDER_ID_REQUIRED');
    }

    const initialBalanceCents = input.initialBalanceCents ?? 0;
    if (!Number.isInteger(initialBalanceCents) || initialBalanceCents < 0) {
      throw new PaymentError('initial_balance_cents must be a non-negative integer', 'INVALID_AMOUNT');
    }

    return this.gateway.issueVirtualCard({
      cardholderId: input.cardholderId,
      currency: input.currency ?? 'USD',
      initialBalanceCents,
    });
  }

  async loadFunds(input: LoadFundsInput): Promise<FundsLoad> {
    if (!input.cardId) {
      throw new PaymentError('card_id required', 'CARD_ID_REQUIRED');
    }
    if (!Number.isInteger(input.amountCents) || input.amountCents <= 0) {
      throw new PaymentError('amount_cents must be > 0', 'INVALID_AMOUNT');
    }
    return this.gateway.loadFunds(input);
  }

  async getCard(cardId: string): Promise<VirtualCard> {
    if (!cardId) {
      throw new PaymentError('card_id required', 'CARD_ID_REQUIRED');
    }
    return this.gateway.getCard(cardId);
  }

  async freezeCard(cardId: string): Promise<CardStatusChange> {
    return this.gateway.freezeCard(cardId);
  }

  async unfreezeCard(cardId: string): Promise<CardStatusChange> {
    return this.gateway.unfreezeCard(cardId);
  }

  async closeCard(cardId: string): Promise<CardStatusChange> {
    return this.gateway.closeCard(cardId);
  }

  async reconcileTopups(options: ReconcileOptions): Promise<TopupRecord[]> {
    return this.gateway.reconcileTopups(options);
  }
}
