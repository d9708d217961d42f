import type { Logger } from 'pino';
import { PlanningAdapter, PlanningProvider, VideoMetadata } from '../types/pipeline.js';
import { createComponentLogger } from '../utils/logger.js';
import { GeminiPlanner } from './gemini-planner.js';
import { OpenAIPlanner } from './openai-planner.js';
import { SettingsSource } from './settings-store.js';

/**
 * Planning adapter that follows the `planningProvider` setting at call time, so a
 * provider switch through the settings surface applies to the next run.
 */
export class PlannerFactory implements PlanningAdapter {
  private readonly logger: Logger;
  private gemini: GeminiPlanner | null = null;
  private openai: OpenAIPlanner | null = null;

  constructor(
    private readonly settings: SettingsSource,
    private readonly parentLogger?: Logger
  ) {
    this.logger = createComponentLogger('planner-factory', parentLogger);
  }

  getPlanner(provider: PlanningProvider = this.settings.get().planningProvider): PlanningAdapter {
    if (provider === 'openai') {
      if (!this.openai) {
        this.logger.info('Initializing OpenAI planner');
        this.openai = new OpenAIPlanner(this.settings, this.parentLogger);
      }
      return this.openai;
    }

    if (!this.gemini) {
      this.logger.info('Initializing Gemini planner');
      this.gemini = new GeminiPlanner(this.settings, this.parentLogger);
    }
    return this.gemini;
  }

  generatePrompt(): Promise<string> {
    return this.getPlanner().generatePrompt();
  }

  generateMetadata(prompt: string): Promise<VideoMetadata> {
    return this.getPlanner().generateMetadata(prompt);
  }
}
