import type { ServiceConfig } from './config';
import type { CodebookRegistry } from './services/codebooks';
import type { InferenceClient } from './services/inferenceEndpoint';
import type { RandomSource } from './services/types';

export type ServiceContext = {
  config: ServiceConfig;
  codebooks: CodebookRegistry;
  inference?: InferenceClient;
  random?: RandomSource;
};
