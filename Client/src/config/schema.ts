import { z } from 'zod';

const HttpUrlSchema = z
  .string()
  .url()
  .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
    message: 'URL must use http or https',
  });

// One tool server the multi-server client can route to
export const ServerConfigSchema = z.object({
  name: z.string().min(1),
  url: HttpUrlSchema,
  description: z.string().optional(),
  enabled: z.boolean().default(true),
  timeout: z.number().positive().default(30000),
  // Higher wins when two servers advertise the same tool name
  priority: z.number().int().default(0),
  tags: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

export const ClientConfigSchema = z.object({
  servers: z.array(ServerConfigSchema).default([]),
  defaultTimeout: z.number().positive().default(30000),
  enableSecurity: z.boolean().default(true),
  securityFailOnViolation: z.boolean().default(true),
  securityFailMode: z.enum(['open', 'closed']).default('open'),
  autoDiscover: z.boolean().default(true),
  refreshInterval: z.number().int().positive().optional(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export function defaultClientConfig(): ClientConfig {
  return ClientConfigSchema.parse({});
}
