import { Value } from '@sinclair/typebox/value';
import { TB } from '../typebox.js';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
  ParsedEnv,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
    return '[REDACTED]';
  }
  return value;
}

function coerceEnvironmentValue(value: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array': {
      try {
        return JSON.parse(value);
      } catch {
        throw new Error(`Cannot parse "${value}" as JSON`);
      }
    }
    default:
      return value;
  }
}

function formatValidationErrors(errors: EnvValidationError[], redactSensitive: boolean): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const value =
      redactSensitive && error.path ? redactValue(error.path, error.value) : error.value;

    const valuePart = value !== undefined ? `, received ${JSON.stringify(value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

function extractSchemaType(schema: TB.TSchema): string {
  if ('type' in schema && typeof schema.type === 'string') {
    return schema.type;
  }
  if ('anyOf' in schema || 'oneOf' in schema) {
    return 'union';
  }
  return 'unknown';
}

// Empty strings count as unset so that `VAR= cmd` falls back to the schema default.
function coerceEnvValues(source: EnvSource, schema: TB.TObject): Record<string, unknown> {
  const coerced: Record<string, unknown> = {};

  for (const [key, propSchema] of Object.entries(schema.properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, extractSchemaType(propSchema));
    } catch {
      coerced[key] = value;
    }
  }

  return coerced;
}

function convertTypeBoxErrors(
  errors: ReturnType<typeof Value.Errors>,
  redactSensitive: boolean,
): EnvValidationError[] {
  const validationErrors: EnvValidationError[] = [];

  for (const error of errors) {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.');
    const value = redactSensitive ? redactValue(path, error.value) : error.value;

    validationErrors.push({
      path: path || 'root',
      message: error.message,
      value,
    });
  }

  return validationErrors;
}

function validateEnv<T extends TB.TSchema>(
  schema: T,
  source: unknown,
  redactSensitive: boolean,
): ParsedEnv<TB.Static<T>> {
  if (Value.Check(schema, source)) {
    return { config: source };
  }

  return {
    errors: convertTypeBoxErrors(Value.Errors(schema, source), redactSensitive),
  };
}

export function createEnvParser(): EnvParser {
  const parse = <T extends TB.TObject>(schema: T, config: EnvParserConfig = {}): TB.Static<T> => {
    const source = config.source ?? process.env;
    const redactSensitive = config.redactSensitive ?? true;

    const withDefaults = Value.Default(schema, coerceEnvValues(source, schema));
    const result = validateEnv(schema, withDefaults, redactSensitive);

    if (result.errors) {
      throw new Error(formatValidationErrors(result.errors, redactSensitive));
    }

    return result.config;
  };

  return {
    parse,
  };
}

export function createEnvContext<T extends TB.TObject>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<TB.Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);

  const nodeEnv =
    typeof parsedConfig === 'object' &&
    parsedConfig !== null &&
    'NODE_ENV' in parsedConfig &&
    typeof parsedConfig.NODE_ENV === 'string'
      ? parsedConfig.NODE_ENV
      : 'development';

  return {
    config: parsedConfig,
    nodeEnv,
  };
}
