export type Cooldown = Readonly<{
  isEligible: (label: string, now: number) => boolean;
  stamp: (label: string, now: number) => void;
  lastTriggered: (label: string) => number | undefined;
}>;

export const createCooldown = (windowMs: number): Cooldown => {
  const last = new Map<string, number>();

  const isEligible = (label: string, now: number): boolean => {
    const t = last.get(label);
    if (t === undefined) return true;
    return now - t >= windowMs;
  };

  const stamp = (label: string, now: number): void => {
    last.set(label, now);
  };

  return { isEligible, stamp, lastTriggered: (label) => last.get(label) };
};
