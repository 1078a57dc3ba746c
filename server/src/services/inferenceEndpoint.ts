import { InvokeEndpointCommand, SageMakerRuntimeClient } from '@aws-sdk/client-sagemaker-runtime';
import { z } from 'zod';
import type { CodeTypeSelector } from './types';

type InferenceRequest = {
  text: string;
  threshold: number;
  top_k: number;
  code_type: CodeTypeSelector;
};

export const remotePredictionSchema = z.object({
  code: z.string(),
  type: z.enum(['ICD-10', 'CPT']),
  description: z.string().optional(),
  confidence: z.number().min(0).max(1),
});

type RemotePrediction = z.infer<typeof remotePredictionSchema>;

const remoteResponseSchema = z.union([
  z.array(remotePredictionSchema),
  z.object({ predictions: z.array(remotePredictionSchema) }).transform((body) => body.predictions),
]);

type InferenceClient = {
  endpointName: string;
  predict(request: InferenceRequest): Promise<RemotePrediction[]>;
};

export function parseInferenceResponse(body: string): RemotePrediction[] {
  return remoteResponseSchema.parse(JSON.parse(body));
}

export function createSageMakerInferenceClient({ endpointName, region }: { endpointName: string; region: string }): InferenceClient {
  const runtime = new SageMakerRuntimeClient({ region });
  const decoder = new TextDecoder('utf-8');

  return {
    endpointName,
    async predict(request) {
      const response = await runtime.send(
        new InvokeEndpointCommand({
          EndpointName: endpointName,
          ContentType: 'application/json',
          Accept: 'application/json',
          Body: new TextEncoder().encode(JSON.stringify(request)),
        })
      );
      if (!response.Body) {
        throw new Error(`Endpoint ${endpointName} returned an empty body`);
      }
      return parseInferenceResponse(decoder.decode(response.Body));
    },
  };
}

export type { InferenceClient, InferenceRequest, RemotePrediction };
