import { env } from './env';
import { createApp } from './app';
import { loadConfig, resolveListenAddress } from './config';
import { CodebookRegistry } from './services/codebooks';
import { createSageMakerInferenceClient } from './services/inferenceEndpoint';

async function main() {
  const config = await loadConfig(env.CONFIG_PATH);
  const codebooks = new CodebookRegistry({
    icd10Path: env.ICD10_CODES_PATH ?? config.paths.icd10_codes,
    cptPath: env.CPT_CODES_PATH ?? config.paths.cpt_codes,
  });
  await codebooks.reload();

  const inference = env.ENDPOINT_NAME
    ? createSageMakerInferenceClient({ endpointName: env.ENDPOINT_NAME, region: env.AWS_REGION ?? config.sagemaker.region })
    : undefined;
  if (!inference) {
    console.info('[app] ENDPOINT_NAME not set – predictions use the local rule engine');
  }

  const app = createApp({ config, codebooks, inference });
  const { host, port } = resolveListenAddress(config.api, { host: env.HOST, port: env.PORT });
  app.listen(port, host, () => {
    console.info(`[app] listening on http://${host}:${port}`);
  });
}

main().catch((error) => {
  console.error('[app] failed to start', error);
  process.exit(1);
});
