import { z } from 'zod';

/**
 * Tool-server descriptor schema.
 * `command`, `args` and `env` are launcher metadata passed through untouched;
 * the core only consumes the server name and description.
 */
export const ToolServerEntrySchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).optional().default([]),
  description: z.string().optional().default(''),
  env: z.record(z.string(), z.string()).optional(),
});

const INTEGER_NAME = /^(0|[1-9][0-9]*)$/;

// Integer-like keys enumerate before all others, so they would not keep file order
export const ToolServerNameSchema = z
  .string()
  .min(1)
  .refine((name) => !INTEGER_NAME.test(name), {
    message: 'Server names must not be bare integers',
  });

export const ToolServerFileSchema = z.object({
  servers: z.record(ToolServerNameSchema, ToolServerEntrySchema),
});

export type ToolServerEntry = z.infer<typeof ToolServerEntrySchema>;
export type ToolServerFile = z.infer<typeof ToolServerFileSchema>;

export interface ToolServerConfig {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly description: string;
  readonly env?: Readonly<Record<string, string>>;
}
