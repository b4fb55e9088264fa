/**
 * Payment Processor - Live Mode Validation Script
 *
 * Checks that:
 * - ENABLE_LIVE_MODE is set (required)
 * - STRIPE_API_KEY is set and looks like a live key (sk_live_...)
 * - STRIPE_LIVE is set to 1 (if you want live behavior)
 *
 * RUN: npx ts-node scripts/validate_live_mode.ts
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { validateLiveMode } from '../src/modules/live-mode';

const report = validateLiveMode(process.env);
for (const line of report.lines) {
  console.log(line);
}
process.exit(report.exitCode);
