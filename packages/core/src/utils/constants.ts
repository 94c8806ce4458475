// packages/core/src/utils/constants.ts — Shared magic number constants

/** Hard upper bound on cleanup passes per run */
export const MAX_PASSES = 3;

/** Sentinel comment that puts a file in scope for marked-file cleanup */
export const SCOPE_MARKER = '//Controller Cleaner';

/** Symbols listed per section in a confirmation summary */
export const SUMMARY_PREVIEW_LIMIT = 10;

/** Project config file name */
export const CONFIG_FILENAME = '.sweeper.yml';

/** Project ignore file name */
export const IGNORE_FILENAME = '.sweeperignore';

/** Per-project state directory */
export const STATE_DIR = '.sweeper';

/** Source extensions that participate in analysis */
export const JAVA_EXTENSIONS = ['.java'];

/** Default number of runs shown by history listings */
export const HISTORY_DEFAULT_LIMIT = 20;
