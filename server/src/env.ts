import dotenv from 'dotenv';
dotenv.config();
export const env = {
  HOST: process.env.HOST || undefined,
  PORT: process.env.PORT ? parseInt(process.env.PORT, 10) : undefined,
  CONFIG_PATH: process.env.CONFIG_PATH || 'configs/config.json',
  ICD10_CODES_PATH: process.env.ICD10_CODES_PATH || undefined,
  CPT_CODES_PATH: process.env.CPT_CODES_PATH || undefined,
  ENDPOINT_NAME: process.env.ENDPOINT_NAME || undefined,
  AWS_REGION: process.env.AWS_REGION || undefined,
};
