/**
 * Process exit codes for runnel
 *
 * The parallel codes sit outside the range tasks usually return so
 * that a wrapper can tell "some parallel work failed" from "all of it
 * failed" without looking at individual results.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_MISSING_TASK = 1;
export const EXIT_PARTIAL_FAILURE = 41;
export const EXIT_ALL_FAILED = 42;

export const MAX_EXIT_CODE = 255;
