import { z } from 'zod';
import activityIdeas from '../data/activity_ideas.json';
import { payloadOf } from './gather.js';
import { ActivitySchema, type Activity } from '../schemas/itinerary.js';
import type { TripRequest } from '../schemas/slots.js';
import type { DailyWeather, GatherResults } from '../providers/types.js';

export interface DaySlot {
  dayNumber: number;
  date: string;
}

export type ActivityDraft = Omit<Activity, 'id' | 'estimated' | 'imageUrl'>;

export interface DayDraft {
  dayNumber: number;
  title: string;
  summary: string;
  activities: ActivityDraft[];
}

export interface CompositionRequest {
  trip: TripRequest;
  gathered: GatherResults;
  /** Days to compose; a replan passes only the affected ones. */
  days: DaySlot[];
  /** The user's modification, when replanning. */
  instruction?: string;
  /** Activity titles the new plan should not repeat. */
  avoid?: string[];
  variant?: number;
}

/** Turns gathered data and trip slots into day drafts. */
export interface PlanComposer {
  readonly kind: 'llm' | 'template';
  compose(request: CompositionRequest, signal?: AbortSignal): Promise<DayDraft[]>;
}

const RAINY_MM = 8;

const IdeaSchema = z.object({ title: z.string(), category: ActivitySchema.shape.category, indoor: z.boolean() });
type Idea = z.infer<typeof IdeaSchema>;
const ideas = z.record(z.array(IdeaSchema).min(1)).parse(activityIdeas);

function ideasFor(theme: string): Idea[] {
  return ideas[theme] ?? ideas.default ?? [];
}

function pick(list: Idea[], index: number, avoid: Set<string>): Idea {
  for (let k = 0; k < list.length; k++) {
    const candidate = list[(index + k) % list.length];
    if (candidate && !avoid.has(candidate.title)) {
      avoid.add(candidate.title);
      return candidate;
    }
  }
  const fallback = list[index % list.length] ?? { title: 'Free time', category: 'rest', indoor: false };
  avoid.add(fallback.title);
  return fallback;
}

export function weatherOn(gathered: GatherResults, date: string): DailyWeather | undefined {
  return payloadOf(gathered, 'weather')?.days.find((d) => d.date === date);
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

/**
 * Deterministic plan used when no LLM is configured, or when the LLM fails
 * and fallback plans are enabled: a morning activity from the day's theme,
 * lunch, and an afternoon activity (indoors when heavy rain is expected).
 */
export class TemplateComposer implements PlanComposer {
  readonly kind = 'template' as const;

  async compose(request: CompositionRequest): Promise<DayDraft[]> {
    return request.days.map((day) => this.composeDay(request, day));
  }

  private composeDay({ trip, gathered, avoid, variant = 0 }: CompositionRequest, day: DaySlot): DayDraft {
    const seen = new Set(avoid ?? []);
    const offset = day.dayNumber - 1 + variant;
    const themes = trip.interests.filter((i) => ideas[i]);
    const theme = themes.length ? themes[offset % themes.length] ?? 'default' : 'default';
    const rainy = (weatherOn(gathered, day.date)?.precipitationMm ?? 0) >= RAINY_MM;

    const morning = pick(ideasFor(theme), offset, seen);
    const lunch = pick(ideasFor('lunch'), offset, seen);
    const afternoon = rainy ? pick(ideasFor('rainy'), offset, seen) : pick(ideasFor('default'), offset + 1, seen);

    const lunchCost = trip.budget
      ? Math.round((trip.budget / trip.durationDays / Math.max(1, trip.travelers)) * 0.08)
      : undefined;

    const activity = (idea: Idea, startTime: string, endTime: string, estimatedCost?: number): ActivityDraft => ({
      title: idea.title,
      description: `${idea.title} in ${trip.destination}.`,
      category: idea.category,
      startTime,
      endTime,
      location: trip.destination,
      imageQuery: `${trip.destination} ${idea.title}`,
      ...(estimatedCost !== undefined ? { estimatedCost } : {}),
    });

    let title = `${theme === 'default' ? 'Exploring' : capitalize(theme)} in ${trip.destination}`;
    if (day.dayNumber === 1) title = `Arrival and ${title.charAt(0).toLowerCase()}${title.slice(1)}`;
    else if (day.dayNumber === trip.durationDays) title = `Final day: ${title.charAt(0).toLowerCase()}${title.slice(1)}`;

    const summary =
      `${morning.title}, ${lunch.title.toLowerCase()}, then ${afternoon.title.toLowerCase()}.` +
      (rainy ? ' Heavy rain is expected, so the afternoon stays indoors.' : '');

    return {
      dayNumber: day.dayNumber,
      title,
      summary,
      activities: [
        activity(morning, '09:00', '11:30'),
        activity(lunch, '12:00', '13:30', lunchCost),
        activity(afternoon, '14:30', '17:30'),
      ],
    };
  }
}
