import { z } from 'zod'

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(
  emptyToUndefined,
  z.string().trim().optional(),
)

const optionalUrl = z.preprocess(
  emptyToUndefined,
  z.string().trim().url().optional(),
)

const positiveInt = (fallback: number) =>
  z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(fallback),
  )

const nonNegativeInt = (fallback: number) =>
  z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().nonnegative().default(fallback),
  )

export const LogLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
])

export const LogDestinationSchema = z.enum(['terminal', 'file', 'both'])

/**
 * Environment variables understood by the sentinel, as read from
 * process.env after dotenv has run.
 */
export const EnvSchema = z
  .object({
    WG_CONTAINER_NAME: z.preprocess(
      emptyToUndefined,
      z.string().trim().default('wg-easy'),
    ),
    WG_CONFIG_PATH: z.preprocess(
      emptyToUndefined,
      z.string().trim().default('/etc/wireguard/wg0.conf'),
    ),
    TIMEOUT_THRESHOLD: positiveInt(120),
    VPN_NAME: optionalString,
    DATA_DIR: optionalString,
    STATE_FILE: optionalString,
    LOCK_FILE: optionalString,
    PUSHOVER_APP_TOKEN: optionalString,
    PUSHOVER_USER_KEY: optionalString,
    PUSHOVER_API_URL: z.preprocess(
      emptyToUndefined,
      z.string().trim().url().default('https://api.pushover.net/1/messages.json'),
    ),
    APPRISE_URL: optionalUrl,
    APPRISE_TARGETS: optionalString,
    NOTIFY_MAX_ATTEMPTS: positiveInt(3),
    NOTIFY_RETRY_DELAY_SECONDS: nonNegativeInt(5),
    POLL_INTERVAL_SECONDS: positiveInt(60),
    LOG_LEVEL: z.preprocess(emptyToUndefined, LogLevelSchema.default('info')),
    LOG_DESTINATION: z.preprocess(
      emptyToUndefined,
      LogDestinationSchema.default('terminal'),
    ),
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.PUSHOVER_APP_TOKEN) !== Boolean(env.PUSHOVER_USER_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.PUSHOVER_APP_TOKEN ? 'PUSHOVER_USER_KEY' : 'PUSHOVER_APP_TOKEN'],
        message: 'PUSHOVER_APP_TOKEN and PUSHOVER_USER_KEY must be set together',
      })
    }
    if (Boolean(env.APPRISE_URL) !== Boolean(env.APPRISE_TARGETS)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [env.APPRISE_URL ? 'APPRISE_TARGETS' : 'APPRISE_URL'],
        message: 'APPRISE_URL and APPRISE_TARGETS must be set together',
      })
    }
  })

export type Env = z.infer<typeof EnvSchema>
