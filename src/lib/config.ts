import { z } from 'zod';
import { DEFAULT_OVERTIME_RULES, type OvertimeRules } from '@/lib/overtimeCalculations';

const optionalNumber = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : value),
    z.coerce.number().positive().default(fallback)
  );

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  TIME_TRACKING_TIME_ZONE: z
    .string()
    .min(1)
    .optional()
    .refine((zone) => zone === undefined || isKnownTimeZone(zone), {
      message: 'Unknown IANA time zone',
    }),
  WEEKLY_OVERTIME_THRESHOLD_HOURS: optionalNumber(DEFAULT_OVERTIME_RULES.weeklyThresholdHours),
  DAILY_OVERTIME_THRESHOLD_HOURS: optionalNumber(DEFAULT_OVERTIME_RULES.dailyThresholdHours),
  WEEKLY_OVERTIME_MULTIPLIER: optionalNumber(DEFAULT_OVERTIME_RULES.weeklyOtMultiplier),
});

export interface SupabaseConfig {
  url: string;
  serviceRoleKey: string;
}

export interface TimeTrackingConfig {
  timeZone?: string;
  overtimeRules: OvertimeRules;
  supabase: SupabaseConfig | null;
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads engine configuration from environment variables.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimeTrackingConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid time tracking configuration: ${details}`);
  }

  const values = parsed.data;
  const supabase =
    values.SUPABASE_URL && values.SUPABASE_SERVICE_ROLE_KEY
      ? { url: values.SUPABASE_URL, serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY }
      : null;

  return {
    timeZone: values.TIME_TRACKING_TIME_ZONE,
    overtimeRules: {
      weeklyThresholdHours: values.WEEKLY_OVERTIME_THRESHOLD_HOURS,
      weeklyOtMultiplier: values.WEEKLY_OVERTIME_MULTIPLIER,
      dailyThresholdHours: values.DAILY_OVERTIME_THRESHOLD_HOURS,
    },
    supabase,
  };
}
