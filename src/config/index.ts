export { EnvSource } from './env';
export {
  IssuingConfig,
  loadIssuingConfig,
  DEFAULT_TOPUP_AMOUNT_CENTS,
  DEFAULT_TOPUP_CURRENCY,
} from './issuing.config';
export { ServerConfig, PayPalCredentials, loadServerConfig, DEFAULT_PORT } from './server.config';
export { STRIPE_API_VERSION } from './stripe.config';
