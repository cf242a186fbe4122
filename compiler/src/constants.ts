
export const LARCH_DIAG_NUM_EXTRA_LINES = 1;

export const LARCH_HARD_ERRORS = process.env['LARCH_HARD_ERRORS'] !== undefined;

export const LARCH_VERBOSE = process.env['LARCH_VERBOSE'] !== undefined;
