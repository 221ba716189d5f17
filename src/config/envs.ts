import 'dotenv/config';
import * as joi from 'joi';
import type { LogLevel } from '@nestjs/common';

interface EnvVars {
  NATS_SERVERS: string[];
  LOG_LEVELS: LogLevel[];
  DELIVERY_SEARCH_CAP: number;
  PREFER_TABLE_GRIDS: boolean;
}

const LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];

const splitList = (raw: string | undefined) => raw?.split(',').map((item) => item.trim());

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    LOG_LEVELS: joi
      .array()
      .items(joi.string().valid(...LOG_LEVELS))
      .default(['log', 'warn', 'error']),
    DELIVERY_SEARCH_CAP: joi.number().integer().min(1).default(100),
    PREFER_TABLE_GRIDS: joi.boolean().default(false),
  })
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: splitList(process.env['NATS_SERVERS']),
  LOG_LEVELS: splitList(process.env['LOG_LEVELS']),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars = value as EnvVars;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  logLevels: envVars.LOG_LEVELS,
  deliverySearchCap: envVars.DELIVERY_SEARCH_CAP,
  preferTableGrids: envVars.PREFER_TABLE_GRIDS,
};
