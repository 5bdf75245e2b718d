import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'csv-normalizer';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

type DescriptionOption = {
  description?: string;
};

export type EnumVarOptions<T extends string> = DescriptionOption & {
  values: readonly [T, ...T[]];
  defaultValue: T;
};

export function enumVar<T extends string>(options: EnumVarOptions<T>) {
  return z.string().optional().transform((value, ctx): T => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options.description);

    const normalized = value?.trim().toLowerCase() ?? '';
    if (normalized.length === 0) {
      return options.defaultValue;
    }

    const match = options.values.find((entry) => entry === normalized);
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Accepted values: ${options.values.map((entry) => `'${entry}'`).join(', ')}`
      });
      return z.NEVER;
    }
    return match;
  });
}

export function isKnownTimeZone(name: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

export type TimeZoneVarOptions = DescriptionOption & {
  defaultValue: string;
};

/**
 * IANA zone name, checked against the zone database bundled with the runtime.
 */
export function timeZoneVar(options: TimeZoneVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options.description);

    const raw = value?.trim() ?? '';
    const zone = raw.length > 0 ? raw : options.defaultValue;
    if (!isKnownTimeZone(zone)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown ${description} '${zone}'`
      });
      return z.NEVER;
    }
    return zone;
  });
}
