/**
 * Process exit codes for the linegate CLI
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_PROMPT_NOT_ALLOWED = 3;
export const EXIT_SIGINT = 130; // 128 + SIGINT(2), UNIX convention
