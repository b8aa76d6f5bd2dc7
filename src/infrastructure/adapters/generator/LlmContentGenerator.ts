import type {
  ContentGeneratorPort,
  EducationRequest,
  RationaleRequest,
} from '../../../application/ports/ContentGeneratorPort.js';
import type { EducationItem } from '../../../domain/entities/CatalogItem.js';
import type { RankedCandidate, Rationale } from '../../../domain/entities/Recommendation.js';

export type CompletionTransport = (input: { system: string; prompt: string }) => Promise<string | null>;

const SYSTEM_PROMPT = `You rewrite short explanations for educational financial content.

Rules:
- Keep every number exactly as written in the draft
- Stay neutral and supportive; never judge or shame the reader
- Do not give financial advice or promise outcomes
- Two sentences at most, plain text only`;

const buildPrompt = (request: RationaleRequest, draft: Rationale): string => {
  const facts = draft.citations.map((citation) => `- ${citation.signal}: ${citation.value}`).join('\n');

  return `Persona: ${request.personaType}
Content (${request.subject.kind}): ${request.subject.item.title}

Facts:
${facts}

Draft:
${draft.text}

Rewrite the draft in a warmer voice.`;
};

/**
 * Ranking stays deterministic; only the rationale wording comes from the
 * model. Any failure, empty reply or reply that drops every cited value
 * falls back to the template text.
 */
export class LlmContentGenerator implements ContentGeneratorPort {
  constructor(
    private readonly fallback: ContentGeneratorPort,
    private readonly complete?: CompletionTransport,
  ) {}

  isLive(): boolean {
    return this.complete !== undefined;
  }

  async generateEducation(request: EducationRequest): Promise<RankedCandidate<EducationItem>[]> {
    return this.fallback.generateEducation(request);
  }

  async composeRationale(request: RationaleRequest): Promise<Rationale> {
    const draft = await this.fallback.composeRationale(request);

    if (!this.complete) {
      return draft;
    }

    try {
      const reply = (await this.complete({ system: SYSTEM_PROMPT, prompt: buildPrompt(request, draft) }))?.trim();

      if (!reply) {
        console.log('⚠️ Empty rationale from LLM, using template');
        return draft;
      }

      if (!draft.citations.some((citation) => reply.includes(citation.value))) {
        console.warn('⚠️ LLM rationale dropped every cited value, using template', {
          itemId: request.subject.item.id,
        });
        return draft;
      }

      return { ...draft, text: reply };
    } catch (error) {
      console.error('❌ LLM rationale failed, using template:', error);
      return draft;
    }
  }
}
