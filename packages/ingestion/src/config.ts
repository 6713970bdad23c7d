import { ConfigError } from './errors.js';

export const BREACH_TYPES = [
  'Data leak',
  'Security breach',
  'Privacy violation',
  'Ransomware',
  'Malware',
  'Phishing',
  'DDoS',
  'Other',
] as const;

export type BreachType = (typeof BREACH_TYPES)[number];

/** Unlabeled entries are assumed to be the most common category. */
export const DEFAULT_BREACH_TYPE: BreachType = 'Data leak';
export const CATCH_ALL_BREACH_TYPE = 'Other' satisfies BreachType;
export const UNKNOWN_SOURCE = 'Unknown';

export const DEFAULT_MAX_CONTENT_LENGTH = 2000;
export const DEFAULT_MAX_SOURCE_LENGTH = 500;
export const DEFAULT_MAX_AUTHOR_LENGTH = 100;
export const DEFAULT_MAX_STORED_RECORDS = 10_000;

/** Channel branding, removed in this order. */
export const DEFAULT_WATERMARKS = ['**🔹 ****t.me/breachdetector**** 🔹**', 't.me/breachdetector', '**🔹', '🔹**'] as const;

export const DEFAULT_BREACH_INDICATORS = [
  'leak',
  'breach',
  'hack',
  'compromise',
  'exposed',
  'stolen',
  'database',
  'credentials',
  'password',
  'email',
  'personal data',
  'user data',
  'customer data',
  'financial data',
  'credit card',
  'ssn',
  'social security',
  'dump',
  'records',
  'accounts',
  'users',
  'customers',
  'financial',
  'banking',
  'payment',
  'transaction',
  'identity',
  'personal',
  'address',
  'phone',
  'dob',
  'date of birth',
  'national id',
  'passport',
] as const;

export const DEFAULT_SPAM_INDICATORS = [
  'buy',
  'sell',
  'offer',
  'discount',
  'promotion',
  'service',
  'tool',
  'software',
  'review',
  'rating',
  'backlink',
  'seo',
  'marketing',
  'advertisement',
  'sponsored',
  'deal',
  'sale',
  'free trial',
  'subscribe',
  'join',
  'telegram.me',
  't.me',
  'channel',
  'group',
  'bot',
  'premium',
] as const;

export interface IngestionConfig {
  maxContentLength?: number;
  maxSourceLength?: number;
  maxAuthorLength?: number;
  maxStoredRecords?: number;
  allowedBreachTypes?: readonly BreachType[];
  defaultBreachType?: BreachType;
  breachIndicators?: readonly string[];
  spamIndicators?: readonly string[];
  watermarks?: readonly string[];
  /** Reject messages without a JSON payload. */
  structuredOnly?: boolean;
}

export type ResolvedIngestionConfig = Readonly<Required<IngestionConfig>>;

function requirePositiveInt(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Merge overrides over the defaults and reject combinations the pipeline
 * cannot honor.
 */
export function resolveIngestionConfig(overrides: IngestionConfig = {}): ResolvedIngestionConfig {
  const allowedBreachTypes: readonly BreachType[] = overrides.allowedBreachTypes ?? BREACH_TYPES;
  const defaultBreachType: BreachType = overrides.defaultBreachType ?? DEFAULT_BREACH_TYPE;

  if (!allowedBreachTypes.includes(CATCH_ALL_BREACH_TYPE)) {
    throw new ConfigError(`allowedBreachTypes must include the catch-all "${CATCH_ALL_BREACH_TYPE}"`);
  }
  if (!allowedBreachTypes.includes(defaultBreachType)) {
    throw new ConfigError(`defaultBreachType "${defaultBreachType}" is not in allowedBreachTypes`);
  }

  return Object.freeze({
    maxContentLength: requirePositiveInt('maxContentLength', overrides.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH),
    maxSourceLength: requirePositiveInt('maxSourceLength', overrides.maxSourceLength ?? DEFAULT_MAX_SOURCE_LENGTH),
    maxAuthorLength: requirePositiveInt('maxAuthorLength', overrides.maxAuthorLength ?? DEFAULT_MAX_AUTHOR_LENGTH),
    maxStoredRecords: requirePositiveInt('maxStoredRecords', overrides.maxStoredRecords ?? DEFAULT_MAX_STORED_RECORDS),
    allowedBreachTypes,
    defaultBreachType,
    breachIndicators: overrides.breachIndicators ?? DEFAULT_BREACH_INDICATORS,
    spamIndicators: overrides.spamIndicators ?? DEFAULT_SPAM_INDICATORS,
    watermarks: overrides.watermarks ?? DEFAULT_WATERMARKS,
    structuredOnly: overrides.structuredOnly ?? false,
  });
}

export function isBreachType(value: unknown, allowed: readonly BreachType[] = BREACH_TYPES): value is BreachType {
  return typeof value === 'string' && allowed.some((type) => type === value);
}
