export { parseSearchCommand, formatSearchReport, quietLogLevel, USAGE } from './search-cli';
export type { SearchCommand } from './search-cli';
