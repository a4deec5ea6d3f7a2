import type { ExtractedSlot, ExtractedSlots, SlotMap, SlotName, TurnIntent } from '../schemas/slots.js';
import { addDays, isoDate, nextWeekStart, upcomingSaturday } from './dates.js';

export interface ExtractionContext {
  now: Date;
  current: SlotMap;
}

export interface TurnExtraction {
  intent: TurnIntent;
  slots: ExtractedSlots;
}

/** Turns one user message into slot extractions. */
export interface SlotExtractor {
  extract(text: string, ctx: ExtractionContext): Promise<TurnExtraction>;
}

// Words that name the slot outright, so the value may replace a locked one.
const OVERRIDE_CUE = /\b(budget|destination|instead|change|switch|actually|rather|make it|update)\b/i;
const MODIFY_CUE = /\b(change|instead|swap|replace|switch|move|different|replan|update|day\s+\d+)\b/i;
const PLAN_CUE = /\b(plan|itinerary|trip|travel|visit|go|going|book|holiday|vacation)\b/i;

const CAPITALIZED_PLACE = "[A-Z][A-Za-z'-]+(?:\\s+[A-Z][A-Za-z'-]+){0,2}";

const NOT_PLACES = new Set([
  'I', 'Hi', 'Hello', 'Hey', 'Thanks', 'Thank', 'Please', 'Yes', 'No', 'Ok', 'Okay',
  'Plan', 'Make', 'Change', 'Switch', 'Swap', 'Replace', 'Let', "Let's", 'Can', 'Could',
  'What', 'How', 'When', 'Where', 'Trip', 'Day', 'Next', 'This', 'Tomorrow', 'Today',
  'Budget', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
  'January', 'February', 'March', 'April', 'May', 'June', 'July', 'August', 'September',
  'October', 'November', 'December',
]);

const CURRENCY_SYMBOLS: Record<string, string> = { '$': 'USD', '€': 'EUR', '£': 'GBP', '฿': 'THB' };
const CURRENCY_WORDS: Array<[RegExp, string]> = [
  [/\b(thb|baht)\b/i, 'THB'],
  [/\b(usd|dollars?)\b/i, 'USD'],
  [/\b(eur|euros?)\b/i, 'EUR'],
  [/\b(gbp|pounds?)\b/i, 'GBP'],
  [/\b(jpy|yen)\b/i, 'JPY'],
];

const TRAVELER_TYPES: Array<[RegExp, string, number | undefined]> = [
  [/\b(solo|alone|by myself)\b/i, 'solo', 1],
  [/\b(couple|honeymoon|my (?:wife|husband|partner|girlfriend|boyfriend))\b/i, 'couple', 2],
  [/\b(family|kids|children)\b/i, 'family', undefined],
  [/\b(friends|group)\b/i, 'friends', undefined],
  [/\b(business|work trip|conference)\b/i, 'business', undefined],
];

const INTEREST_KEYWORDS: Array<[RegExp, string]> = [
  [/\bbeach(es)?\b/i, 'beaches'],
  [/\b(food|eat|eating|cuisine|street food|restaurants?)\b/i, 'food'],
  [/\b(temples?|history|historic|museums?|culture|cultural)\b/i, 'culture'],
  [/\b(hiking|trek(king)?|nature|national parks?|waterfalls?)\b/i, 'nature'],
  [/\b(diving|snorkel(l)?ing|surf(ing)?)\b/i, 'water sports'],
  [/\b(shopping|markets?|malls?)\b/i, 'shopping'],
  [/\b(nightlife|bars?|clubs?)\b/i, 'nightlife'],
  [/\b(spa|massage|relax(ing|ation)?)\b/i, 'wellness'],
  [/\b(art|galleries|gallery)\b/i, 'art'],
  [/\b(islands?|island hopping)\b/i, 'islands'],
];

function slot(value: ExtractedSlot['value'], confidence: number, explicit: boolean): ExtractedSlot {
  return { value, confidence, explicit };
}

function parseAmount(raw: string, thousands: string | undefined): number {
  const n = Number(raw.replace(/,/g, ''));
  return thousands ? n * 1000 : n;
}

function cleanPlace(raw: string): string | undefined {
  const words = raw.trim().split(/\s+/);
  while (words.length && NOT_PLACES.has(words[words.length - 1] ?? '')) words.pop();
  if (!words.length || NOT_PLACES.has(words[0] ?? '')) return undefined;
  return words.join(' ');
}

function extractBudget(text: string, out: ExtractedSlots): void {
  const keyed = /\bbudget(?:\s+(?:is|of|to|around|about|under))?\s*:?\s*([$€£฿])?\s*(\d[\d,]*(?:\.\d+)?)\s*(k)?\b/i.exec(text);
  const symbol = /([$€£฿])\s*(\d[\d,]*(?:\.\d+)?)\s*(k)?\b/i.exec(text);
  const suffixed = /\b(\d+(?:\.\d+)?)k\b/i.exec(text);

  if (keyed?.[2]) {
    out.budget = slot(parseAmount(keyed[2], keyed[3]), 0.9, true);
    const sym = keyed[1];
    if (sym && CURRENCY_SYMBOLS[sym]) out.currency = slot(CURRENCY_SYMBOLS[sym], 0.9, true);
  } else if (symbol?.[1] && symbol[2]) {
    out.budget = slot(parseAmount(symbol[2], symbol[3]), 0.85, true);
    const code = CURRENCY_SYMBOLS[symbol[1]];
    if (code) out.currency = slot(code, 0.9, true);
  } else if (suffixed?.[1]) {
    out.budget = slot(parseAmount(suffixed[1], 'k'), 0.6, false);
  }

  if (!out.currency) {
    for (const [re, code] of CURRENCY_WORDS) {
      if (re.test(text)) {
        out.currency = slot(code, 0.85, true);
        break;
      }
    }
  }
}

function extractDuration(text: string, out: ExtractedSlots): void {
  const days = /\b(\d{1,2})\s*-?\s*days?\b/i.exec(text);
  const nights = /\b(\d{1,2})\s*-?\s*nights?\b/i.exec(text);
  const weeks = /\b(\d)\s*weeks?\b/i.exec(text);
  if (days?.[1]) {
    out.duration_days = slot(Number(days[1]), 0.9, true);
  } else if (nights?.[1]) {
    out.duration_days = slot(Number(nights[1]) + 1, 0.85, true);
  } else if (weeks?.[1]) {
    out.duration_days = slot(Number(weeks[1]) * 7, 0.85, true);
  } else if (/\b(?:a|one)\s+week\b/i.test(text)) {
    out.duration_days = slot(7, 0.8, true);
  } else if (/\bweekend\b/i.test(text)) {
    out.duration_days = slot(2, 0.7, false);
  }
}

function extractDates(text: string, now: Date, out: ExtractedSlots): string {
  const range = /\b(?:from\s+)?(\d{4}-\d{2}-\d{2})\s+(?:to|until|till|-)\s+(\d{4}-\d{2}-\d{2})\b/i.exec(text);
  if (range?.[1] && range[2]) {
    out.start_date = slot(range[1], 0.95, true);
    out.end_date = slot(range[2], 0.95, true);
    return text.replace(range[0], ' ');
  }

  const single = /\b(\d{4}-\d{2}-\d{2})\b/.exec(text);
  if (single?.[1]) {
    out.start_date = slot(single[1], 0.9, true);
  } else if (/\bnext week\b/i.test(text)) {
    out.start_date = slot(nextWeekStart(now), 0.8, true);
  } else if (/\bthis weekend\b/i.test(text)) {
    const saturday = upcomingSaturday(now);
    out.start_date = slot(saturday, 0.8, true);
    out.end_date = slot(addDays(saturday, 1), 0.8, true);
  } else if (/\btomorrow\b/i.test(text)) {
    out.start_date = slot(addDays(isoDate(now), 1), 0.85, true);
  }
  return text;
}

function extractTravelers(text: string, out: ExtractedSlots): void {
  for (const [re, type, count] of TRAVELER_TYPES) {
    if (re.test(text)) {
      out.traveler_type = slot(type, 0.8, false);
      if (count !== undefined) out.travelers = slot(count, 0.75, false);
      break;
    }
  }
  const counted = /\b(\d{1,2})\s*(?:people|persons|travell?ers|adults|pax|of us)\b/i.exec(text);
  if (counted?.[1]) out.travelers = slot(Number(counted[1]), 0.85, true);
}

function extractInterests(text: string, override: boolean, out: ExtractedSlots): void {
  const found: string[] = [];
  for (const [re, interest] of INTEREST_KEYWORDS) {
    if (re.test(text) && !found.includes(interest)) found.push(interest);
  }
  if (found.length) out.interests = slot(found, 0.7, override);
}

function extractPlaces(text: string, override: boolean, out: ExtractedSlots): void {
  const named = new RegExp(`\\bdestination\\s*(?:is|:|to|=)?\\s*(${CAPITALIZED_PLACE})`).exec(text);
  const toPlace = new RegExp(`\\b(?:to|visit|visiting|towards)\\s+(${CAPITALIZED_PLACE})`).exec(text);
  const inPlace = new RegExp(`\\bin\\s+(${CAPITALIZED_PLACE})`).exec(text);
  const fromPlace = new RegExp(`\\bfrom\\s+(${CAPITALIZED_PLACE})`).exec(text);

  const origin = fromPlace?.[1] ? cleanPlace(fromPlace[1]) : undefined;
  if (origin) out.origin = slot(origin, 0.8, override);

  const candidates: Array<[string | undefined, number, boolean]> = [
    [named?.[1], 0.95, true],
    [toPlace?.[1], 0.8, override],
    [inPlace?.[1], 0.75, override],
  ];
  for (const [raw, confidence, explicit] of candidates) {
    const place = raw ? cleanPlace(raw) : undefined;
    if (place && place !== origin) {
      out.destination = slot(place, confidence, explicit);
      return;
    }
  }

  // Bare place segment: "budget 20000, 3 days, Phuket"
  for (const segment of text.split(/[,.;!?\n]/)) {
    const trimmed = segment.trim();
    if (!new RegExp(`^${CAPITALIZED_PLACE}$`).test(trimmed)) continue;
    const place = cleanPlace(trimmed);
    if (place && place === trimmed && place !== origin) {
      out.destination = slot(place, 0.75, override);
      return;
    }
  }
}

function classify(text: string, slots: ExtractedSlots): TurnIntent['kind'] {
  if (MODIFY_CUE.test(text)) return 'modify';
  if (PLAN_CUE.test(text)) return 'plan';
  return Object.keys(slots).length ? 'inform' : 'other';
}

/**
 * Regex and keyword extractor. Works without any model and backs the LLM
 * extractor when that one fails.
 */
export class HeuristicSlotExtractor implements SlotExtractor {
  async extract(text: string, ctx: ExtractionContext): Promise<TurnExtraction> {
    return extractSlots(text, ctx.now);
  }
}

export function extractSlots(text: string, now: Date): TurnExtraction {
  const slots: ExtractedSlots = {};
  const override = OVERRIDE_CUE.test(text);

  const rest = extractDates(text, now, slots);
  extractBudget(rest, slots);
  extractDuration(rest, slots);
  extractTravelers(rest, slots);
  extractInterests(rest, override, slots);
  extractPlaces(rest, override, slots);

  const names = Object.keys(slots).filter((k): k is SlotName => k in slots);
  return { intent: { kind: classify(text, slots), slots: names }, slots };
}
