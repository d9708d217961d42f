import { GoogleGenAI } from '@google/genai';
import type { Logger } from 'pino';
import { PlanningAdapter, VideoMetadata } from '../types/pipeline.js';
import { ConfigError, ProviderError, describeError, toProviderError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import {
  buildMetadataRequest,
  buildVideoPromptRequest,
  cleanVideoPrompt,
  fallbackMetadata,
  parseMetadataResponse
} from './planning-prompts.js';
import { SettingsSource } from './settings-store.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export class GeminiPlanner implements PlanningAdapter {
  private readonly logger: Logger;
  private client: { apiKey: string; ai: GoogleGenAI } | null = null;

  constructor(
    private readonly settings: SettingsSource,
    logger?: Logger
  ) {
    this.logger = createComponentLogger('gemini-planner', logger);
  }

  async generatePrompt(): Promise<string> {
    const { agentInstructions } = this.settings.get();
    this.logger.info('Generating video prompt with Gemini');

    const prompt = cleanVideoPrompt(await this.complete(buildVideoPromptRequest(agentInstructions), 'generating a video prompt'));
    if (!prompt) {
      throw new ProviderError('gemini', 'Gemini returned an empty video prompt');
    }
    return prompt;
  }

  async generateMetadata(prompt: string): Promise<VideoMetadata> {
    try {
      const text = await this.complete(buildMetadataRequest(prompt), 'generating metadata');
      return parseMetadataResponse(text, prompt, this.logger);
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Metadata generation failed, using fallback metadata');
      return fallbackMetadata(prompt);
    }
  }

  private getClient(): GoogleGenAI {
    const { geminiApiKey } = this.settings.get();
    if (!geminiApiKey) {
      throw new ConfigError('Gemini API key not configured');
    }
    // Rebuilt when the key changes through the settings surface.
    if (!this.client || this.client.apiKey !== geminiApiKey) {
      this.client = { apiKey: geminiApiKey, ai: new GoogleGenAI({ apiKey: geminiApiKey }) };
    }
    return this.client.ai;
  }

  private async complete(contents: string, action: string): Promise<string> {
    const ai = this.getClient();
    const model = this.settings.get().planningModel ?? DEFAULT_GEMINI_MODEL;

    let text: string | undefined;
    try {
      const response = await ai.models.generateContent({ model, contents });
      text = response.text;
    } catch (error) {
      throw toProviderError('gemini', error, action);
    }

    if (!text || !text.trim()) {
      throw new ProviderError('gemini', `Empty response from Gemini while ${action}`);
    }
    return text;
  }
}
