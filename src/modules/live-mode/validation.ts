/**
 * Payment Processor - Live Mode Validation
 * Pre-flight report for operators before switching to live issuing.
 *
 * ISSUES block a live run (exit code 1). WARNINGS are printed but do not block.
 */

import { EnvSource, IssuingConfig, loadIssuingConfig } from '../../config';
import { ConfigurationError } from '../../shared/errors';
import { authorizeTopup } from '../issuing/adapter.selector';
import { classifyCredential, maskCredential } from '../issuing/credential';

export interface LiveModeReport {
  readonly issues: string[];
  readonly warnings: string[];
  readonly lines: string[];
  readonly exitCode: 0 | 1;
}

const RULE = '='.repeat(60);

function formatDollars(amountCents: number): string {
  return `$${(amountCents / 100).toFixed(2)}`;
}

export function validateLiveMode(env: EnvSource): LiveModeReport {
  const issues: string[] = [];
  const warnings: string[] = [];
  const lines: string[] = [RULE, 'Live Issuing Mode Validation', RULE];

  let config: IssuingConfig;
  try {
    config = loadIssuingConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    issues.push(error.message);
    return finish(lines, issues, warnings);
  }

  lines.push(`ENABLE_LIVE_MODE: ${config.liveModeEnabled}`);
  if (!config.liveModeEnabled) {
    issues.push("ENABLE_LIVE_MODE is not set. Set to '1' to enable live operations.");
  }

  const apiKey = config.apiKey;
  lines.push(apiKey ? `STRIPE_API_KEY: ${maskCredential(apiKey)}` : 'STRIPE_API_KEY: (not set)');
  const shape = apiKey ? classifyCredential(apiKey) : null;

  if (!apiKey) {
    issues.push('STRIPE_API_KEY is not set. Obtain from https://dashboard.stripe.com/apikeys');
  } else if (shape === 'unrecognized') {
    issues.push("STRIPE_API_KEY does not look like a Stripe key (should start with 'sk_' or 'rk_').");
  } else if (shape === 'test') {
    if (config.liveRequested) {
      issues.push('STRIPE_LIVE is set with a test key (sk_test_...). The issuing gate will refuse to start.');
    }
    if (config.liveModeEnabled) {
      warnings.push(
        'STRIPE_API_KEY looks like a test key (sk_test_...) but ENABLE_LIVE_MODE=1. Test keys will fail in live mode.'
      );
    }
  }

  lines.push(`STRIPE_LIVE: ${config.liveRequested}`);
  if (!config.liveRequested) {
    warnings.push('STRIPE_LIVE is not set. Live card operations will fall back to mock adapter.');
  }

  if (config.doTopup) {
    lines.push('STRIPE_DO_TOPUP: true (real top-ups will be performed)');
    lines.push(
      `STRIPE_TOPUP_AMOUNT_CENTS: ${config.topupAmountCents} cents (${formatDollars(config.topupAmountCents)})`
    );

    try {
      authorizeTopup(config);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      issues.push(error.message);
    }

    if (config.liveModeEnabled && shape === 'live') {
      warnings.push('STRIPE_DO_TOPUP is enabled with a live key. Top-ups will move REAL MONEY.');
    }
  } else {
    lines.push('STRIPE_DO_TOPUP: false (disabled; top-ups will not run)');
  }

  return finish(lines, issues, warnings);
}

function finish(lines: string[], issues: string[], warnings: string[]): LiveModeReport {
  lines.push('', RULE);

  if (issues.length > 0) {
    lines.push('ISSUES:', ...issues.map((issue) => `  - ${issue}`));
  }
  if (warnings.length > 0) {
    lines.push('WARNINGS:', ...warnings.map((warning) => `  - ${warning}`));
  }
  if (issues.length === 0 && warnings.length === 0) {
    lines.push('Configuration looks good!');
  }

  lines.push(RULE);

  return {
    issues,
    warnings,
    lines,
    exitCode: issues.length === 0 ? 0 : 1,
  };
}
