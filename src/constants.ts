// Default bend for linear arcs. 1 approximates a half circle.
export const DEFAULT_CURVATURE = 1

// Number of points each arc is sampled into.
export const DEFAULT_N_SAMPLES = 100

// Control points emitted per edge before sampling.
export const N_CONTROL_POINTS = 4

// Decimal places kept when writing coordinates.
export const COORDINATE_PRECISION = 3
