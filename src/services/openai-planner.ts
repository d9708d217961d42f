import OpenAI from 'openai';
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

export const DEFAULT_OPENAI_PLANNING_MODEL = 'gpt-4o-mini';

export class OpenAIPlanner implements PlanningAdapter {
  private readonly logger: Logger;
  private client: { apiKey: string; openai: OpenAI } | null = null;

  constructor(
    private readonly settings: SettingsSource,
    logger?: Logger
  ) {
    this.logger = createComponentLogger('openai-planner', logger);
  }

  async generatePrompt(): Promise<string> {
    const { agentInstructions } = this.settings.get();
    this.logger.info('Generating video prompt with OpenAI');

    const content = await this.complete(buildVideoPromptRequest(agentInstructions), 'generating a video prompt', false);
    const prompt = cleanVideoPrompt(content);
    if (!prompt) {
      throw new ProviderError('openai', 'OpenAI returned an empty video prompt');
    }
    return prompt;
  }

  async generateMetadata(prompt: string): Promise<VideoMetadata> {
    try {
      const content = await this.complete(buildMetadataRequest(prompt), 'generating metadata', true);
      return parseMetadataResponse(content, prompt, this.logger);
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Metadata generation failed, using fallback metadata');
      return fallbackMetadata(prompt);
    }
  }

  private getClient(): OpenAI {
    const { openaiApiKey } = this.settings.get();
    if (!openaiApiKey) {
      throw new ConfigError('OpenAI API key not configured');
    }
    if (!this.client || this.client.apiKey !== openaiApiKey) {
      this.client = { apiKey: openaiApiKey, openai: new OpenAI({ apiKey: openaiApiKey }) };
    }
    return this.client.openai;
  }

  private async complete(content: string, action: string, json: boolean): Promise<string> {
    const openai = this.getClient();
    const model = this.settings.get().planningModel ?? DEFAULT_OPENAI_PLANNING_MODEL;

    let text: string | null | undefined;
    try {
      const response = await openai.chat.completions.create({
        model,
        temperature: json ? 0.7 : 0.9,
        messages: [{ role: 'user', content }],
        ...(json ? { response_format: { type: 'json_object' as const } } : {})
      });
      text = response.choices[0]?.message?.content;
    } catch (error) {
      throw toProviderError('openai', error, action);
    }

    if (!text || !text.trim()) {
      throw new ProviderError('openai', `No response from OpenAI while ${action}`);
    }
    return text;
  }
}
