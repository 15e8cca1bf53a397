// Kubernetes resource quantities ("100m", "1Gi", "500000000n", "1e3")

export class QuantityError extends Error {
  constructor(quantity: string) {
    super(`Invalid resource quantity "${quantity}"`);
    this.name = 'QuantityError';
  }
}

// Powers of ten
const DECIMAL_SUFFIXES: Record<string, number> = {
  n: -9,
  u: -6,
  m: -3,
  '': 0,
  k: 3,
  M: 6,
  G: 9,
  T: 12,
  P: 15,
  E: 18
};

const BINARY_SUFFIXES: [string, number][] = [
  ['Ei', 2 ** 60],
  ['Pi', 2 ** 50],
  ['Ti', 2 ** 40],
  ['Gi', 2 ** 30],
  ['Mi', 2 ** 20],
  ['Ki', 2 ** 10]
];

const DECIMAL_FORMATS: [string, number][] = [
  ['E', 1e18],
  ['P', 1e15],
  ['T', 1e12],
  ['G', 1e9],
  ['M', 1e6],
  ['k', 1e3]
];

const QUANTITY_RE = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:(Ki|Mi|Gi|Ti|Pi|Ei|[numkMGTPE])|[eE]([+-]?\d+))?$/;

// Negative powers divide so "100m" parses to exactly 0.1
function scale(value: number, exponent: number): number {
  return exponent < 0 ? value / 10 ** -exponent : value * 10 ** exponent;
}

// Drops float noise (0.1 * 1000 = 100.00000000000001) before rounding up
function ceilClean(value: number): number {
  return Math.ceil(Math.round(value * 1e6) / 1e6);
}

// Parses a quantity into base units: cores for CPU, bytes for memory
export function parseQuantity(quantity: string): number {
  const match = QUANTITY_RE.exec(quantity.trim());
  if (!match) {
    throw new QuantityError(quantity);
  }
  const [, num = '', suffix = '', exponent] = match;
  const value = parseFloat(num);

  if (exponent !== undefined) {
    return scale(value, parseInt(exponent, 10));
  }

  const binary = BINARY_SUFFIXES.find(([s]) => s === suffix);
  if (binary) {
    return value * binary[1];
  }

  const power = DECIMAL_SUFFIXES[suffix];
  if (power === undefined) {
    throw new QuantityError(quantity);
  }
  return scale(value, power);
}

// CPU quantity in millicores, rounded up like the API server does
export function toMillis(quantity: string): number {
  return ceilClean(parseQuantity(quantity) * 1000);
}

export function toBytes(quantity: string): number {
  return ceilClean(parseQuantity(quantity));
}

export function formatCPU(millis: number): string {
  if (millis % 1000 === 0) {
    return `${millis / 1000}`;
  }
  return `${millis}m`;
}

// Picks the largest binary suffix that divides the value exactly, then the largest decimal one
export function formatMemory(bytes: number): string {
  if (bytes === 0) {
    return '0';
  }
  for (const [suffix, size] of [...BINARY_SUFFIXES, ...DECIMAL_FORMATS]) {
    if (bytes % size === 0) {
      return `${bytes / size}${suffix}`;
    }
  }
  return `${bytes}`;
}

export function formatPerc(perc: number): string {
  if (!Number.isFinite(perc)) {
    return '∞';
  }
  return perc.toFixed(2);
}
