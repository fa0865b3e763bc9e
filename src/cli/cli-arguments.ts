export interface CliArguments {
  /**
   * The selected mode (e.g. `list`, `show`), whether it was given as a flag
   * (`--list`) or as a command word.
   */
  readonly command: string;
  /**
   * Positional arguments: the host name of `host`, the directory of
   * `createlinks`.
   */
  readonly positionals: string[];
  /**
   * Raw option map keyed by camelCase names (e.g. `vaultPasswordFile`).
   */
  readonly options: Record<string, unknown>;
}
