import { circuitBreaker, ConsecutiveBreaker, handleAll, timeout, TimeoutStrategy } from 'cockatiel';
import type pino from 'pino';
import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import type { LlmConfig } from '../config/llm.js';
import { ActivitySchema } from '../schemas/itinerary.js';
import {
  ExtractedSlotSchema,
  SLOT_NAMES,
  slotValues,
  TurnIntentSchema,
  type ExtractedSlots,
} from '../schemas/slots.js';
import { CompositionFailureError, PlannerError } from './errors.js';
import { payloadOf } from './gather.js';
import { getPrompt, renderPrompt } from './prompts.js';
import type { CompositionRequest, DayDraft, PlanComposer } from './composer.js';
import type { ExtractionContext, SlotExtractor, TurnExtraction } from './slot_parser.js';
import { isoDate } from './dates.js';

/** Minimal JSON-completion surface the composer and extractor need. */
export interface LlmClient {
  completeJson(prompt: string, signal?: AbortSignal): Promise<unknown>;
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

/** Parses model output that may be wrapped in a ``` fence. */
export function parseJsonContent(content: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const body = (fenced?.[1] ?? content).trim();
  return JSON.parse(body);
}

/** OpenAI-compatible `/chat/completions` over undici, behind a timeout and a breaker. */
export class OpenAiCompatibleClient implements LlmClient {
  private readonly breaker = circuitBreaker(handleAll, {
    halfOpenAfter: 30_000,
    breaker: new ConsecutiveBreaker(3),
  });

  constructor(
    private readonly cfg: LlmConfig,
    private readonly log: pino.Logger,
  ) {}

  async completeJson(prompt: string, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;
    const started = Date.now();
    const body = await this.breaker.execute(() =>
      timeout(this.cfg.timeoutMs, TimeoutStrategy.Aggressive).execute(async ({ signal: callSignal }) => {
        const res = await undiciFetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${this.cfg.apiKey}` },
          body: JSON.stringify({
            model: this.cfg.model,
            messages: [{ role: 'user', content: prompt }],
            temperature: this.cfg.temperature,
            response_format: { type: 'json_object' },
            ...(this.cfg.maxTokens !== undefined ? { max_tokens: this.cfg.maxTokens } : {}),
          }),
          signal: callSignal,
        });
        if (!res.ok) {
          const text = await res.text();
          throw new Error(`HTTP ${res.status}: ${text.slice(0, 100)}`);
        }
        return ChatCompletionSchema.parse(await res.json());
      }, signal),
    );
    this.log.debug({ model: this.cfg.model, latencyMs: Date.now() - started }, 'llm:completion');
    return parseJsonContent(body.choices[0]?.message.content ?? '');
  }
}

const ActivityDraftSchema = ActivitySchema.pick({
  title: true,
  category: true,
  startTime: true,
  endTime: true,
  location: true,
  estimatedCost: true,
}).extend({ description: z.string().default('') });

const PlanDraftSchema = z.object({
  days: z.array(
    z.object({
      dayNumber: z.number().int().min(1),
      title: z.string().min(1),
      summary: z.string().default(''),
      activities: z.array(ActivityDraftSchema).min(1),
    }),
  ),
});

function gatheredForPrompt(req: CompositionRequest): string {
  const { gathered } = req;
  return JSON.stringify({
    weather: payloadOf(gathered, 'weather')?.days,
    flights: payloadOf(gathered, 'flights')?.offers.slice(0, 3),
    hotels: payloadOf(gathered, 'hotels')?.offers.slice(0, 3),
    transit: payloadOf(gathered, 'transit')?.legs,
  });
}

export class LlmPlanComposer implements PlanComposer {
  readonly kind = 'llm' as const;

  constructor(
    private readonly client: LlmClient,
    private readonly log: pino.Logger,
  ) {}

  async compose(request: CompositionRequest, signal?: AbortSignal): Promise<DayDraft[]> {
    try {
      const prompt = renderPrompt(await getPrompt('plan_composer'), {
        trip: JSON.stringify(request.trip),
        days: JSON.stringify(request.days),
        gathered: gatheredForPrompt(request),
        instruction: request.instruction ?? '',
        avoid: (request.avoid ?? []).join('; '),
      });
      const plan = PlanDraftSchema.parse(await this.client.completeJson(prompt, signal));
      return request.days.map(({ dayNumber }) => {
        const day = plan.days.find((d) => d.dayNumber === dayNumber);
        if (!day) throw new CompositionFailureError(`Model plan is missing day ${dayNumber}`);
        return day;
      });
    } catch (err) {
      if (err instanceof PlannerError) throw err;
      this.log.warn({ err }, 'composer:llm_failed');
      throw new CompositionFailureError('Plan composition failed', err);
    }
  }
}

const LlmExtractionSchema = z.object({
  intent: TurnIntentSchema.shape.kind.catch('other'),
  slots: z.record(z.unknown()).default({}),
});

/** Slot extraction through the LLM; any model fault falls back to the heuristic extractor. */
export class LlmSlotExtractor implements SlotExtractor {
  constructor(
    private readonly client: LlmClient,
    private readonly fallback: SlotExtractor,
    private readonly log: pino.Logger,
  ) {}

  async extract(text: string, ctx: ExtractionContext): Promise<TurnExtraction> {
    try {
      const prompt = renderPrompt(await getPrompt('slot_extractor'), {
        today: isoDate(ctx.now),
        current: JSON.stringify(slotValues(ctx.current)),
        text,
      });
      const raw = LlmExtractionSchema.parse(await this.client.completeJson(prompt));
      const slots: ExtractedSlots = {};
      for (const name of SLOT_NAMES) {
        const parsed = ExtractedSlotSchema.safeParse(raw.slots[name]);
        if (parsed.success) slots[name] = parsed.data;
      }
      return { intent: { kind: raw.intent, slots: SLOT_NAMES.filter((n) => slots[n]) }, slots };
    } catch (err) {
      this.log.warn({ err }, 'extractor:llm_failed');
      return this.fallback.extract(text, ctx);
    }
  }
}
