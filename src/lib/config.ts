import { DEFAULT_GRADING_METHOD, isPushPolicy, type GradingMethod } from './grading-method';

function buildGradingMethod(): GradingMethod {
  const ceiling = parseFloat(process.env.GRADING_REALISM_CEILING || '');
  const pushPolicy = process.env.GRADING_PUSH_POLICY || '';

  return {
    ...DEFAULT_GRADING_METHOD,
    realismCeiling: Number.isFinite(ceiling) && ceiling > 0 ? ceiling : DEFAULT_GRADING_METHOD.realismCeiling,
    pushPolicy: isPushPolicy(pushPolicy) ? pushPolicy : DEFAULT_GRADING_METHOD.pushPolicy,
  };
}

export const config = {
  // App Configuration
  appTimezone: process.env.APP_TIMEZONE || 'America/New_York',

  // Supabase Configuration
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || '',
  batchSize: parseInt(process.env.SUPABASE_BATCH_SIZE || '100', 10),
  pageSize: 1000,

  // Cycle windows
  gradingLookbackHours: parseInt(process.env.GRADING_LOOKBACK_HOURS || '24', 10),
  resolutionLookbackHours: parseInt(process.env.RESOLUTION_LOOKBACK_HOURS || '72', 10),
  settleDelayHours: parseFloat(process.env.SETTLE_DELAY_HOURS || '4'), // box scores land a few hours after tip-off
  calibratePrior: process.env.CALIBRATE_PRIOR === 'true',
  calibrationSampleSize: parseInt(process.env.CALIBRATION_SAMPLE_SIZE || '500', 10),

  // Grading method (versioned together)
  gradingMethod: buildGradingMethod(),
} as const;
