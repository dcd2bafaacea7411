export const d2r = (d: number) => d * Math.PI / 180;
export const r2d = (r: number) => r * 180 / Math.PI;
export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));
export const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);
