// Analysis agent — stage 2: challenges, opportunities and sales approach from the language model

import type { AnalysisOutput, ExecutionContextReadView, StagePolicy, Subject } from '../types/stages.js';
import { TerminalStageError } from '../types/errors.js';
import type { LanguageModel } from '../bridge/language-model.js';
import { buildAnalysisPrompt } from '../utils/prompts.js';
import { parseAnalysis } from '../utils/analysis-parser.js';
import { BaseStage } from './base-stage.js';

export class AnalysisAgent extends BaseStage<AnalysisOutput> {
  constructor(private readonly model: LanguageModel, policy: StagePolicy = 'required') {
    super('analysis', policy, ['research'], 'AnalysisAgent');
  }

  protected async perform(
    subject: Subject,
    view: ExecutionContextReadView,
    signal: AbortSignal,
  ): Promise<AnalysisOutput> {
    const research = this.requireOutput(view, 'research');
    const text = await this.model.complete(buildAnalysisPrompt(research), {
      temperature: 0.7,
      maxTokens: 2000,
      signal,
    });

    const parsed = parseAnalysis(text);
    if (parsed.keyChallenges.length === 0 && parsed.opportunities.length === 0) {
      throw new TerminalStageError(`Analysis for ${subject.displayName} contained no recognisable sections`);
    }
    this.log.debug(`Found ${parsed.keyChallenges.length} challenges`, { company: subject.displayName });

    return { kind: 'analysis', analysis: text, ...parsed };
  }
}
