import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export { HumanFormatter } from './human.js';
export { JsonFormatter, describeOption } from './json.js';
export type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  return format === 'json' ? new JsonFormatter(options) : new HumanFormatter(options);
}
