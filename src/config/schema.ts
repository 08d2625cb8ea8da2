import { z } from 'zod';
import { LOG_LEVELS } from '@/utils/logger';

/** Bolt and routing schemes accepted by neo4j-driver, with their TLS variants */
export const NEO4J_URL_PROTOCOL = /^(neo4j|bolt)(\+s|\+ssc)?$/;

/** Values left empty by an unset {env:VAR} count as absent */
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const neo4jSchema = z
  .object({
    url: z.url({ protocol: NEO4J_URL_PROTOCOL }),
    user: optionalText,
    password: optionalText,
    database: optionalText
  })
  .transform((data) => {
    // Credentials embedded in the URL win over the separate fields
    const url = new URL(data.url);
    const user = url.username ? decodeURIComponent(url.username) : data.user;
    const password = url.password ? decodeURIComponent(url.password) : data.password;
    url.username = '';
    url.password = '';

    return {
      uri: url.toString(),
      user,
      password,
      database: data.database
    };
  });

// Config schema
export const configSchema = z.object({
  $schema: z.string().optional(),

  neo4j: neo4jSchema,

  logging: z
    .object({
      level: z.enum(LOG_LEVELS).optional()
    })
    .optional()
});

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
export type Neo4jSettings = Config['neo4j'];
