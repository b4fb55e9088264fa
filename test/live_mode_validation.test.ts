import { describe, it, expect } from '@jest/globals';
import { validateLiveMode } from '../src/modules/live-mode';

const RULE = '='.repeat(60);

describe('validateLiveMode', () => {
  it('reports every missing setting for an empty environment', () => {
    const report = validateLiveMode({});

    expect(report.exitCode).toBe(1);
    expect(report.lines).toEqual([
      RULE,
      'Live Issuing Mode Validation',
      RULE,
      'ENABLE_LIVE_MODE: false',
      'STRIPE_API_KEY: (not set)',
      'STRIPE_LIVE: false',
      'STRIPE_DO_TOPUP: false (disabled; top-ups will not run)',
      '',
      RULE,
      'ISSUES:',
      "  - ENABLE_LIVE_MODE is not set. Set to '1' to enable live operations.",
      '  - STRIPE_API_KEY is not set. Obtain from https://dashboard.stripe.com/apikeys',
      'WARNINGS:',
      '  - STRIPE_LIVE is not set. Live card operations will fall back to mock adapter.',
      RULE,
    ]);
  });

  it('passes a complete live configuration without top-ups', () => {
    const report = validateLiveMode({
      ENABLE_LIVE_MODE: '1',
      STRIPE_API_KEY: 'sk_live_placeholder',
      STRIPE_LIVE: '1',
    });

    expect(report.issues).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.exitCode).toBe(0);
    expect(report.lines).toContain('STRIPE_API_KEY: sk_live_****');
    expect(report.lines.slice(-3)).toEqual([RULE, 'Configuration looks good!', RULE]);
  });

  it('warns that live top-ups move real money', () => {
    const report = validateLiveMode({
      ENABLE_LIVE_MODE: '1',
      STRIPE_API_KEY: 'sk_live_placeholder',
      STRIPE_LIVE: '1',
      STRIPE_DO_TOPUP: '1',
      STRIPE_TOPUP_AMOUNT_CENTS: '2500',
    });

    expect(report.exitCode).toBe(0);
    expect(report.lines).toContain('STRIPE_DO_TOPUP: true (real top-ups will be performed)');
    expect(report.lines).toContain('STRIPE_TOPUP_AMOUNT_CENTS: 2500 cents ($25.00)');
    expect(report.warnings).toEqual(['STRIPE_DO_TOPUP is enabled with a live key. Top-ups will move REAL MONEY.']);
  });

  it('blocks a test key when live mode is requested', () => {
    const report = validateLiveMode({
      ENABLE_LIVE_MODE: '1',
      STRIPE_API_KEY: 'sk_test_placeholder',
      STRIPE_LIVE: '1',
    });

    expect(report.exitCode).toBe(1);
    expect(report.issues).toEqual([
      'STRIPE_LIVE is set with a test key (sk_test_...). The issuing gate will refuse to start.',
    ]);
    expect(report.warnings).toEqual([
      'STRIPE_API_KEY looks like a test key (sk_test_...) but ENABLE_LIVE_MODE=1. Test keys will fail in live mode.',
    ]);
  });

  it('flags a key of unknown shape and masks it', () => {
    const report = validateLiveMode({
      ENABLE_LIVE_MODE: '1',
      STRIPE_API_KEY: 'abc123secret',
      STRIPE_LIVE: '1',
    });

    expect(report.lines).toContain('STRIPE_API_KEY: abc****');
    expect(report.issues).toEqual([
      "STRIPE_API_KEY does not look like a Stripe key (should start with 'sk_' or 'rk_').",
    ]);
  });

  it('reports a non-positive top-up amount', () => {
    const report = validateLiveMode({
      ENABLE_LIVE_MODE: '1',
      STRIPE_API_KEY: 'sk_live_placeholder',
      STRIPE_LIVE: '1',
      STRIPE_DO_TOPUP: '1',
      STRIPE_TOPUP_AMOUNT_CENTS: '0',
    });

    expect(report.exitCode).toBe(1);
    expect(report.issues).toEqual(['top-up amount must be a positive integer number of cents, got 0']);
  });

  it('stops early on an unparseable environment', () => {
    const report = validateLiveMode({ STRIPE_TOPUP_AMOUNT_CENTS: 'ten' });

    expect(report.exitCode).toBe(1);
    expect(report.lines).toEqual([
      RULE,
      'Live Issuing Mode Validation',
      RULE,
      '',
      RULE,
      'ISSUES:',
      '  - Invalid issuing configuration: STRIPE_TOPUP_AMOUNT_CENTS: must be an integer',
      RULE,
    ]);
  });
});
