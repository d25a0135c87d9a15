/**
 * validate 命令选项。
 */
export interface ValidateCommandOptions {
  json?: boolean;
  strict?: boolean;
  /**
   * commander 的 `--no-color` 会把 color 置为 false。
   */
  color?: boolean;
}
