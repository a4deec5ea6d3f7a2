import { z } from 'zod';
import { SOURCE_NAMES } from '../providers/types.js';
import { TripRequestSchema } from './slots.js';

export const ActivitySchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  category: z.enum(['sightseeing', 'dining', 'culture', 'nature', 'shopping', 'entertainment', 'rest']),
  startTime: z.string().regex(/^\d{2}:\d{2}$/).optional(),
  endTime: z.string().regex(/^\d{2}:\d{2}$/).optional(),
  location: z.string().optional(),
  estimatedCost: z.number().min(0).optional(),
  imageQuery: z.string().optional(),
  imageUrl: z.string().nullable().optional(),
  estimated: z.boolean(),
});
export type Activity = z.infer<typeof ActivitySchema>;

export const WeatherAnnotationSchema = z.object({
  highC: z.number(),
  lowC: z.number(),
  precipitationMm: z.number(),
  condition: z.string(),
  estimated: z.boolean(),
});
export type WeatherAnnotation = z.infer<typeof WeatherAnnotationSchema>;

export const DayPlanSchema = z.object({
  /** Stable across versions: `day-<n>`. */
  id: z.string().min(1),
  dayNumber: z.number().int().min(1),
  date: z.string(),
  title: z.string(),
  summary: z.string(),
  activities: z.array(ActivitySchema),
  weather: WeatherAnnotationSchema.nullable(),
  transitMinutes: z.number().min(0).nullable(),
  /** True when any content of the day came from synthesized data or the template composer. */
  estimated: z.boolean(),
  composedBy: z.enum(['llm', 'template']),
});
export type DayPlan = z.infer<typeof DayPlanSchema>;

export const BookingAnnotationsSchema = z.object({
  flight: z
    .object({
      carrier: z.string(),
      price: z.number(),
      currency: z.string(),
      estimated: z.boolean(),
    })
    .nullable(),
  hotel: z
    .object({
      name: z.string(),
      tier: z.string(),
      pricePerNight: z.number(),
      total: z.number(),
      currency: z.string(),
      estimated: z.boolean(),
    })
    .nullable(),
});
export type BookingAnnotations = z.infer<typeof BookingAnnotationsSchema>;

export const SourceFlagSchema = z.object({
  source: z.enum(SOURCE_NAMES),
  outcome: z.enum(['ok', 'fallback', 'error', 'missing']),
  synthesized: z.boolean(),
  reason: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
});
export type SourceFlag = z.infer<typeof SourceFlagSchema>;

export const ItineraryVersionSchema = z.object({
  id: z.string().min(1),
  itineraryId: z.string().min(1),
  version: z.number().int().min(1),
  parentVersionId: z.string().nullable(),
  conversationKey: z.string().optional(),
  trip: TripRequestSchema,
  days: z.array(DayPlanSchema),
  bookings: BookingAnnotationsSchema,
  sources: z.array(SourceFlagSchema),
  modification: z.string().optional(),
  createdAt: z.string(),
});
export type ItineraryVersion = z.infer<typeof ItineraryVersionSchema>;
