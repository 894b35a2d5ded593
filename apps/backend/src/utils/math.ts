export const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

export const approach = (value: number, target: number, maxStep: number) => {
  const diff = target - value;
  if (Math.abs(diff) <= maxStep) return target;
  return value + Math.sign(diff) * maxStep;
};

/** Half-cosine ease from 0 to 1 over progress 0..1. */
export const easeInOutCosine = (progress: number) => 0.5 * (1 - Math.cos(progress * Math.PI));
