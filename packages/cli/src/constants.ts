export const CLI_DEFAULTS = {
  DEFAULT_CONFIG_FILE: 'polyprompt.config.yaml',
  DEFAULT_ENV_FILE: '.env',
  DIVIDER_WIDTH: 80,
  /** Exit code after SIGINT/SIGTERM, following the shell convention 128 + 2 */
  EXIT_INTERRUPTED: 130,
} as const
