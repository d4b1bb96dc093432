/**
 * Parser manifest schema.
 */
import { z } from 'zod';
import { ACTIONS } from '../option/action.js';
import { OPT_KINDS } from '../option/option.js';
import { VALUE_TYPES } from '../option/value-parser.js';
import { POLICY_KINDS } from '../policy/types.js';
import { DEFAULT_USER_STYLES, STYLES, USER_STYLES } from '../style/style.js';

const OptValueSchema = z.union([z.boolean(), z.number(), z.string()]);

/** An option given as an object, for settings a declaration string cannot carry. */
export const OptionEntryObjectSchema = z.object({
  /** Declaration string, e.g. `--count;-c=i!` */
  decl: z.string().min(1),
  kind: z.enum(OPT_KINDS).optional(),
  type: z.enum(VALUE_TYPES).optional(),
  alias: z.array(z.string()).default([]),
  action: z.enum(ACTIONS).optional(),
  default: z.union([OptValueSchema, z.array(OptValueSchema)]).optional(),
  force: z.boolean().optional(),
  nodelay: z.boolean().optional(),
  styles: z.array(z.enum(STYLES)).optional(),
  help: z.string().optional(),
});

/** An option: a bare declaration string or an object. */
export const OptionEntrySchema = z.union([z.string().min(1), OptionEntryObjectSchema]);

const ParserFieldsSchema = z.object({
  name: z.string().min(1).default('app'),
  policy: z.enum(POLICY_KINDS).default('forward'),
  prefixes: z.array(z.string()).default(['--', '-']),
  styles: z.array(z.enum(USER_STYLES)).default([...DEFAULT_USER_STYLES]),
  /** Unset means the policy's own default (off for pre, on otherwise). */
  strict: z.boolean().optional(),
  overload: z.boolean().default(false),
  bare_options: z.boolean().default(false),
  options: z.array(OptionEntrySchema).default([]),
});

/** A sub-parser, reachable by its name or aliases under a pre policy. */
export const SubcommandSchema = ParserFieldsSchema.extend({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
});

export const ManifestSchema = ParserFieldsSchema.extend({
  subcommands: z.array(SubcommandSchema).default([]),
});

export type OptionEntry = z.infer<typeof OptionEntrySchema>;
export type Subcommand = z.infer<typeof SubcommandSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
/** A manifest as written, before defaults are applied. */
export type ManifestInput = z.input<typeof ManifestSchema>;
