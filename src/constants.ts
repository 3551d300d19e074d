export const DEFAULT_RANDOM_SEED = 1000;
export const DEFAULT_MAX_ATTEMPTS = 1000;
export const DEFAULT_BETA = 2;
export const DEFAULT_NONBOND_EPSILON = 5;

export const XYZ_DECIMALS = 6;
