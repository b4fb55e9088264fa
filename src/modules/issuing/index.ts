/**
 * Payment Processor - Issuing Module Export
 */

// Gateway Interface
export { IssuingGateway } from './issuing.port';

// Mode selection & safety gate
export { selectAdapter, authorizeTopup, AdapterFactories } from './adapter.selector';
export { classifyCredential, maskCredential, CredentialShape } from './credential';

// Adapters
export { MockIssuingAdapter, MockIssuingOptions } from './adapters/mock-issuing.adapter';
export {
  StripeIssuingAdapter,
  StripeIssuingAdapterOptions,
  StripeIssuingClient,
  createStripeIssuingClient,
} from './adapters/stripe-issuing.adapter';

export { IssuingProcessor } from './issuing.service';
export { runIssuingFlow, IssuingFlowInput, IssuingFlowResult } from './issuing.flow';
