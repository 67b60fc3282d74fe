/**
 * Discrete damage distributions: total damage -> probability.
 *
 * Damage rolls are equally likely, so single- and fixed-hit distributions
 * only ever hold dyadic probabilities and stay exact in doubles.
 */
export type Distribution = ReadonlyMap<number, number>;

const EPSILON = 1e-12;

export function uniform(values: readonly number[]): Distribution {
  const dist = new Map<number, number>();
  const p = 1 / values.length;
  for (const value of values) dist.set(value, (dist.get(value) ?? 0) + p);
  return dist;
}

/**
 * Distribution of the sum of two independent draws. With `cap`, totals are
 * clamped to it, which keeps KO-chance convolutions small.
 */
export function convolve(a: Distribution, b: Distribution, cap = Infinity): Distribution {
  const result = new Map<number, number>();
  for (const [x, px] of a) {
    for (const [y, py] of b) {
      const total = Math.min(x + y, cap);
      result.set(total, (result.get(total) ?? 0) + px * py);
    }
  }
  return result;
}

export function repeat(dist: Distribution, times: number, cap = Infinity): Distribution {
  let result: Distribution = new Map([[0, 1]]);
  for (let i = 0; i < times; i++) result = convolve(result, dist, cap);
  return result;
}

export function mixture(
  parts: readonly { dist: Distribution; weight: number }[],
): Distribution {
  const result = new Map<number, number>();
  for (const { dist, weight } of parts) {
    for (const [value, p] of dist) {
      result.set(value, (result.get(value) ?? 0) + p * weight);
    }
  }
  return result;
}

export function minValue(dist: Distribution): number {
  return Math.min(...dist.keys());
}

export function maxValue(dist: Distribution): number {
  return Math.max(...dist.keys());
}

export function probabilityAtLeast(dist: Distribution, threshold: number): number {
  let total = 0;
  for (const [value, p] of dist) {
    if (value >= threshold) total += p;
  }
  return Math.min(1, total);
}

/**
 * `count` evenly spaced quantiles (the k-th at k / (count - 1)), ascending.
 * The first is the minimum, the last the maximum.
 */
export function quantiles(dist: Distribution, count: number): number[] {
  const sorted = [...dist.entries()].sort(([a], [b]) => a - b);
  const result: number[] = [];
  let index = 0;
  let cumulative = sorted[0][1];
  for (let k = 0; k < count; k++) {
    const target = count === 1 ? 1 : k / (count - 1);
    while (cumulative < target - EPSILON && index < sorted.length - 1) {
      index++;
      cumulative += sorted[index][1];
    }
    result.push(sorted[index][0]);
  }
  return result;
}
