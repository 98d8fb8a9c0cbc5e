import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { formatIssues } from '../core/validation.js';

const envVarName = z.string().trim().min(1).optional();

export const authConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('bearer'),
    token: z.string().min(1).optional(),
    token_env: envVarName
  }),
  z.object({
    type: z.literal('api_key'),
    api_key: z.string().min(1).optional(),
    key_env: envVarName,
    header_name: z.string().trim().min(1).default('X-API-Key')
  }),
  z.object({
    type: z.literal('basic'),
    username: z.string().min(1),
    password: z.string()
  })
]);

export type AuthConfig = z.infer<typeof authConfigSchema>;
export type AuthType = AuthConfig['type'];

export interface AuthProvider {
  readonly type: AuthType;
  /** Headers merged over the request's own headers before every attempt. */
  headers(): Record<string, string>;
  /** Header names whose values must never reach a log line. */
  readonly sensitiveHeaders: readonly string[];
}

const REDACTED = '[REDACTED]';
const ALWAYS_SENSITIVE = ['authorization', 'proxy-authorization', 'cookie', 'x-api-key'];

class BearerAuth implements AuthProvider {
  readonly type = 'bearer';
  readonly sensitiveHeaders = ['authorization'];

  constructor(private readonly token: string) {}

  headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.token}` };
  }
}

class ApiKeyAuth implements AuthProvider {
  readonly type = 'api_key';
  readonly sensitiveHeaders: readonly string[];

  constructor(
    private readonly apiKey: string,
    private readonly headerName: string
  ) {
    this.sensitiveHeaders = [headerName.toLowerCase()];
  }

  headers(): Record<string, string> {
    return { [this.headerName]: this.apiKey };
  }
}

class BasicAuth implements AuthProvider {
  readonly type = 'basic';
  readonly sensitiveHeaders = ['authorization'];
  private readonly encoded: string;

  constructor(username: string, password: string) {
    this.encoded = Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
  }

  headers(): Record<string, string> {
    return { Authorization: `Basic ${this.encoded}` };
  }
}

const resolveSecret = (
  label: string,
  direct: string | undefined,
  envName: string | undefined,
  env: NodeJS.ProcessEnv
): string => {
  if (direct) return direct;
  if (!envName) {
    throw new ConfigurationError(`${label} auth needs either a value or an environment variable name`);
  }
  const value = env[envName]?.trim();
  if (!value) {
    throw new ConfigurationError(`Environment variable '${envName}' for ${label} auth is not set`, { envName });
  }
  return value;
};

export const parseAuthConfig = (input: unknown): AuthConfig => {
  const parsed = authConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid auth config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const createAuthProvider = (config: AuthConfig, env: NodeJS.ProcessEnv = process.env): AuthProvider => {
  switch (config.type) {
    case 'bearer':
      return new BearerAuth(resolveSecret('bearer', config.token, config.token_env, env));
    case 'api_key':
      return new ApiKeyAuth(resolveSecret('api_key', config.api_key, config.key_env, env), config.header_name);
    case 'basic':
      return new BasicAuth(config.username, config.password);
  }
};

/** Copy of `headers` with credential-bearing values replaced. */
export const redactHeaders = (
  headers: Readonly<Record<string, string>>,
  extraSensitive: readonly string[] = []
): Record<string, string> => {
  const sensitive = new Set([...ALWAYS_SENSITIVE, ...extraSensitive.map((h) => h.toLowerCase())]);
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    out[name] = sensitive.has(name.toLowerCase()) ? REDACTED : value;
  }
  return out;
};
