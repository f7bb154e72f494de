/**
 * Options registered on the root command and shared by every subcommand.
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}
