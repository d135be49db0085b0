import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { PreparationError } from './types.js';

export const clientConfigSchema = z.object({
  /** Per-attempt timeout, from sending the request to receiving response headers */
  timeoutMs: z.number().int().positive().default(120_000),
  connectTimeoutMs: z.number().int().positive().default(30_000),
  keepAliveTimeoutMs: z.number().int().positive().default(10_000),
  keepAliveMaxTimeoutMs: z.number().int().positive().default(60_000),
  userAgent: z.string().min(1).default('courier-http/0.1.0'),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfig = z.output<typeof clientConfigSchema>;

export const defaultClientConfig: ClientConfig = clientConfigSchema.parse({});

export const rateLimitConfigSchema = z.object({
  requestsPerSecond: z.number().positive().finite(),
  burstLimit: z.number().int().min(1).optional(),
});

export type RateLimitConfig = z.infer<typeof rateLimitConfigSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const parseWith = <T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  label: string
): Result<z.output<T>, Error> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(new PreparationError(`Invalid ${label}: ${formatIssues(parsed.error)}`, { cause: parsed.error }));
  }
  return ok(parsed.data);
};

export const resolveClientConfig = (input: ClientConfigInput = {}): Result<ClientConfig, Error> =>
  parseWith(clientConfigSchema, input, 'client configuration');

export const resolveRateLimitConfig = (input: RateLimitConfig): Result<RateLimitConfig, Error> =>
  parseWith(rateLimitConfigSchema, input, 'rate limit configuration');
