export function mean(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
}

// Divides by n: a ranking history is the whole population.
export function populationStandardDeviation(values: number[]): number | null {
  const avg = mean(values);
  if (avg === null) {
    return null;
  }
  const variance = values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function zScore(value: number, avg: number, deviation: number): number | null {
  if (!Number.isFinite(value) || !Number.isFinite(avg) || !Number.isFinite(deviation) || deviation === 0) {
    return null;
  }
  return (value - avg) / deviation;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}
