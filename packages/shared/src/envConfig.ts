import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

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

type EnvIssue = {
  path: (string | number)[];
  message: string;
};

function formatErrorMessage(context: string, issues: EnvIssue[]): string {
  const details = issues.map(({ path, message }) => {
    const location = path.length > 0 ? path.join('.') : '<root>';
    return `  - ${location}: ${message}`;
  });
  return [`[${context}] Invalid environment configuration`, ...details].join('\n');
}

export function loadEnvConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  options?: LoadEnvConfigOptions
): z.output<TSchema> {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'stepgraph';

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

function describeVar(path: (string | number)[], description?: string): string {
  if (description) {
    return description;
  }
  const name = path.length > 0 ? path[path.length - 1] : undefined;
  if (name === undefined || name === '') {
    return 'value';
  }
  return String(name);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type CommonVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

export type BooleanVarOptions = CommonVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = describeVar(ctx.path, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type IntegerVarOptions = CommonVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describeVar(ctx.path, options?.description);

    if (isBlank(value)) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
      return z.NEVER;
    }
    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }
    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = CommonVarOptions<string> & {
  trim?: boolean;
  lowercase?: boolean;
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const description = describeVar(ctx.path, options?.description);
    const raw = value === undefined ? undefined : options?.trim === false ? value : value.trim();

    if (raw === undefined || raw.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const normalized = options?.lowercase ? raw.toLowerCase() : raw;
    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} does not match expected pattern`
      });
      return z.NEVER;
    }

    return normalized;
  });
}
