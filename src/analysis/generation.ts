import { Agent, run, type AgentInputItem } from '@openai/agents';

import type { ModelsConfig } from '../runtime/botConfig.js';

export const generationDeps = { run };

/**
 * Generative-language seam. Both calls are stateless: no instructions, no
 * history, one model round trip each. Failures propagate to the caller.
 */
export interface GenerationClient {
  generateText(prompt: string): Promise<string>;
  generateFromImage(image: { bytes: Uint8Array; mimeType: string }): Promise<string>;
}

function toBase64(input: Uint8Array): string {
  return Buffer.from(input).toString('base64');
}

export function buildImageDataUrl(bytes: Uint8Array, mimeType: string): string {
  return `data:${mimeType};base64,${toBase64(bytes)}`;
}

const readFinalOutput = (finalOutput: unknown): string => {
  const text = String(finalOutput ?? '');
  if (!text.trim()) {
    throw new Error('Model returned an empty response');
  }
  return text;
};

export function createAgentsGenerationClient(models: Pick<ModelsConfig, 'text' | 'vision'>): GenerationClient {
  const textAgent = new Agent({ name: 'TextGeneration', model: models.text });
  const visionAgent = new Agent({ name: 'ImageAnalysis', model: models.vision });

  return {
    async generateText(prompt) {
      const result = await generationDeps.run(textAgent, prompt);
      return readFinalOutput(result.finalOutput);
    },

    async generateFromImage(image) {
      const input: AgentInputItem[] = [
        {
          role: 'user',
          content: [{ type: 'input_image', image: buildImageDataUrl(image.bytes, image.mimeType), detail: 'auto' }],
        },
      ];
      const result = await generationDeps.run(visionAgent, input);
      return readFinalOutput(result.finalOutput);
    },
  };
}
