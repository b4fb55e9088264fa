/**
 * Pinned Stripe API version used by every Stripe client in the processor.
 * Must match the `stripe` package major's LatestApiVersion.
 */
export const STRIPE_API_VERSION = '2023-10-16' as const;
