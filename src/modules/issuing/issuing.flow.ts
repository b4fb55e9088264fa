/**
 * Payment Processor - Issuing Flow
 * Cardholder -> virtual card -> (gated) top-up -> freeze / unfreeze / close
 *
 * The top-up gate is evaluated BEFORE anything is created, so a bad amount
 * aborts the run with nothing issued.
 */

import { IssuingConfig } from '../../config';
import { BillingAddress, Cardholder, CardStatus, FundsLoad, VirtualCard } from '../../shared/types';
import { authorizeTopup } from './adapter.selector';
import { IssuingProcessor } from './issuing.service';

export interface IssuingFlowInput {
  readonly name: string;
  readonly email?: string;
  readonly billing?: BillingAddress;
  readonly currency?: string;
  readonly initialBalanceCents?: number;
}

export interface IssuingFlowResult {
  readonly cardholder: Cardholder;
  readonly card: VirtualCard;
  readonly topup: FundsLoad | null;
  readonly statuses: CardStatus[];
}

export async function runIssuingFlow(
  processor: IssuingProcessor,
  config: IssuingConfig,
  input: IssuingFlowInput
): Promise<IssuingFlowResult> {
  const topupAuthorized = authorizeTopup(config);

  console.log(`[IssuingFlow] Creating cardholder ${input.name} (${processor.mode} mode)...`);
  const cardholder = await processor.createCardholder({
    name: input.name,
    email: input.email,
    billing: input.billing,
  });

  const card = await processor.issueVirtualCard({
    cardholderId: cardholder.id,
    currency: input.currency ?? 'USD',
    initialBalanceCents: input.initialBalanceCents ?? 0,
  });
  console.log(`[IssuingFlow] Card issued: ${card.id}`);

  let topup: FundsLoad | null = null;
  if (topupAuthorized) {
    console.log(`[IssuingFlow] Top-up authorized: loading ${config.topupAmountCents} cents onto ${card.id}`);
    topup = await processor.loadFunds({
      cardId: card.id,
      amountCents: config.topupAmountCents,
      currency: config.topupCurrency,
    });
  } else {
    console.log('[IssuingFlow] Top-up not authorized (STRIPE_DO_TOPUP unset); skipping');
  }

  const statuses: CardStatus[] = [];
  statuses.push((await processor.freezeCard(card.id)).status);
  statuses.push((await processor.unfreezeCard(card.id)).status);
  statuses.push((await processor.closeCard(card.id)).status);

  console.log(`[IssuingFlow] Card lifecycle: ${statuses.join(' -> ')}`);

  return { cardholder, card, topup, statuses };
}
