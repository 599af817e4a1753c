export type UnavailableReason = 'QuoteUnavailable' | 'ConversionUnavailable' | 'PriceUnavailable';

export interface Available<T> {
  status: 'available';
  value: T;
}

export interface Unavailable {
  status: 'unavailable';
  reason: UnavailableReason;
  detail: string;
}

// Live data is routinely partial; callers branch on the tag instead of a sentinel value.
export type Availability<T> = Available<T> | Unavailable;

export function available<T>(value: T): Available<T> {
  return { status: 'available', value };
}

export function unavailable(reason: UnavailableReason, detail: string): Unavailable {
  return { status: 'unavailable', reason, detail };
}

export function isAvailable<T>(result: Availability<T>): result is Available<T> {
  return result.status === 'available';
}

export function mapAvailable<T, U>(result: Availability<T>, fn: (value: T) => U): Availability<U> {
  return isAvailable(result) ? available(fn(result.value)) : result;
}

/** Collects every value, or returns the first unavailable entry */
export function allAvailable<T>(results: Availability<T>[]): Availability<T[]> {
  const values: T[] = [];
  for (const result of results) {
    if (!isAvailable(result)) {
      return result;
    }
    values.push(result.value);
  }
  return available(values);
}
