export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Source of uniform values in [0, 1). */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export const pickRandom = <T>(items: readonly T[], random: RandomSource): T | undefined => {
  if (items.length === 0) {
    return undefined;
  }

  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
};

export const toIso = (epochMs: number): string => new Date(epochMs).toISOString();
