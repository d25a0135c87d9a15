export interface ListCommandOptions {
  category?: string;
  json?: boolean;
}
