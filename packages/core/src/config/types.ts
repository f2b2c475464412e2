import { z } from 'zod';

/** How much of the login flow is automated. */
export const LoginModeSchema = z.enum(['full-auto', 'visual-auto', 'manual']);
export type LoginMode = z.infer<typeof LoginModeSchema>;

/** Poll intervals, deadlines and retry bounds. All durations in ms. */
export const TimingConfigSchema = z.object({
  loginPollIntervalMs: z.number().int().positive().default(500),
  loginDeadlineMs: z.number().int().positive().default(180_000),
  /** Consecutive polls with no applicable handler before the page is reset */
  stuckThreshold: z.number().int().positive().default(8),
  maxPageResets: z.number().int().min(0).default(2),
  livenessPollIntervalMs: z.number().int().positive().default(1_000),
  establishTimeoutMs: z.number().int().positive().default(30_000),
  teardownGraceMs: z.number().int().positive().default(5_000),
  /** Automatic re-logins after the tunnel rejects a cookie */
  maxRelogins: z.number().int().min(0).default(1),
});

export type TimingConfig = z.infer<typeof TimingConfigSchema>;

/** Zod schema for config.yaml. */
export const VpnConfigSchema = z.object({
  portalUrl: z.string().url(),
  cookieDomain: z.string().min(1),
  cookieName: z.string().min(1).default('DSID'),
  interfaceName: z.string().regex(/^[A-Za-z0-9_.-]{1,15}$/).default('tunnelkit0'),
  escalationTool: z.string().min(1).nullable().default(null),
  openconnectPath: z.string().min(1).default('openconnect'),
  loginMode: LoginModeSchema.default('full-auto'),
  email: z.string().email().nullable().default(null),
  userAgent: z.string().min(1).default('Mozilla/5.0'),
  browserExecutablePath: z.string().min(1).nullable().default(null),
  /** Probe a stored cookie over HTTP before launching a browser */
  probeStoredCookie: z.boolean().default(true),
  timing: TimingConfigSchema.default({}),
});

/** Fully resolved configuration. */
export type VpnConfig = z.infer<typeof VpnConfigSchema>;

/** Configuration as written by a user (defaults not yet applied). */
export type VpnConfigInput = z.input<typeof VpnConfigSchema>;
