export type ByteUnitSystem = 'si' | 'iec';

export class InvalidByteSizeError extends Error {
  readonly input: string;

  constructor(input: string, message: string) {
    super(message);
    this.name = 'InvalidByteSizeError';
    this.input = input;
    Object.setPrototypeOf(this, InvalidByteSizeError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      input: this.input,
      stack: this.stack,
    };
  }
}

const unitPrefixes = ['k', 'm', 'g', 't', 'p', 'e', 'z', 'y'];

const siSuffixes = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'];
const iecSuffixes = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB'];

function createUnitMultipliers(): Map<string, bigint> {
  const multipliers = new Map<string, bigint>([
    ['', 1n],
    ['b', 1n],
  ]);

  unitPrefixes.forEach((prefix, index) => {
    const exponent = BigInt(index + 1);
    const si = 1000n ** exponent;
    const iec = 1024n ** exponent;

    multipliers.set(prefix, si);
    multipliers.set(`${prefix}b`, si);
    multipliers.set(`${prefix}i`, iec);
    multipliers.set(`${prefix}ib`, iec);
  });

  return multipliers;
}

const unitMultipliers = createUnitMultipliers();

/**
 * Parses a human-readable size such as `100MB`, `1.5 GiB` or `1,024` into bytes.
 *
 * SI units (`kB`, `MB`, ...) are powers of 1000, IEC units (`KiB`, `MiB`, ...)
 * powers of 1024; a bare number is a byte count. Fractional results are floored.
 */
export function parseBytes(input: string): number {
  const match = /^([\d.,]*)([\s\S]*)$/.exec(input);
  const rawNumber = match?.[1] ?? '';
  const rawUnit = match?.[2] ?? input;

  const numberMatch = /^(\d*)(?:\.(\d*))?$/.exec(rawNumber.replace(/,/g, ''));
  const integerDigits = numberMatch?.[1] ?? '';
  const fractionDigits = numberMatch?.[2] ?? '';

  if (!numberMatch || integerDigits.length + fractionDigits.length === 0) {
    throw new InvalidByteSizeError(input, `invalid numeric value '${rawNumber}'`);
  }

  const unit = rawUnit.trim().toLowerCase();
  const multiplier = unitMultipliers.get(unit);

  if (multiplier === undefined) {
    throw new InvalidByteSizeError(input, `unhandled size name: ${unit}`);
  }

  const digits = BigInt(`${integerDigits}${fractionDigits}` || '0');
  const scale = 10n ** BigInt(fractionDigits.length);

  return Number((digits * multiplier) / scale);
}

// Whole quotient plus the last remainder over the base.
function splitMagnitude(bytes: number, base: number, maxMagnitude: number) {
  const divisor = BigInt(base);
  let quotient = BigInt(Math.floor(bytes));
  let remainder = 0n;
  let magnitude = 0;

  while (quotient >= divisor) {
    remainder = quotient % divisor;
    quotient /= divisor;
    magnitude++;
    if (magnitude === maxMagnitude) break;
  }

  return { value: Number(quotient) + Number(remainder) / base, magnitude };
}

// Only dyadic values sit exactly halfway: x.5 for whole numbers, x.25 and x.75 for tenths.
function isHalfway(value: number, fractionDigits: 0 | 1): boolean {
  const steps = fractionDigits === 0 ? 2 : 4;
  return Number.isInteger(value * steps) && !Number.isInteger(value * (steps / 2));
}

function toFixedHalfEven(value: number, fractionDigits: 0 | 1): string {
  if (!isHalfway(value, fractionDigits)) {
    return value.toFixed(fractionDigits);
  }

  const scale = 10 ** fractionDigits;
  const lower = Math.floor(value * scale);
  const rounded = lower % 2 === 0 ? lower : lower + 1;

  return (rounded / scale).toFixed(fractionDigits);
}

/**
 * Formats a byte count, e.g. `150000000` as "150 MB" or, with `iec`,
 * `1288490188` as "1.2 GiB". Values below ten units keep one decimal;
 * halfway values round to even.
 */
export function formatBytes(bytes: number, units: ByteUnitSystem = 'si'): string {
  if (bytes < 10) {
    return `${bytes} B`;
  }

  const base = units === 'iec' ? 1024 : 1000;
  const suffixes = units === 'iec' ? iecSuffixes : siSuffixes;
  const { value, magnitude } = splitMagnitude(bytes, base, suffixes.length - 1);

  return `${toFixedHalfEven(value, value < 10 ? 1 : 0)} ${suffixes[magnitude]}`;
}
