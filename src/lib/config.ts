import { z } from "zod";
import type { CardTemplate, DeckConfig } from "@/types/deck";
import { CARD_COLORS, DEFAULT_DECK } from "@/lib/deck";
import { DEFAULT_MIN_PRESS_MS, DEFAULT_SWIPE_THRESHOLD } from "@/lib/gesture";

export type DeckEnv = {
  NEXT_PUBLIC_DECK_COLORS?: string;
  NEXT_PUBLIC_SWIPE_THRESHOLD?: string;
  NEXT_PUBLIC_MIN_PRESS_MS?: string;
};

export const DeckColorsSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((token) => token.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.enum(CARD_COLORS)).min(1))
  .transform((colors): CardTemplate[] => colors.map((color) => ({ color })));

export const SwipeThresholdSchema = z.coerce.number().finite().positive();

export const MinPressSchema = z.coerce.number().int().nonnegative();

function readEnv(): DeckEnv {
  // Literal access so Next inlines the values into the client bundle.
  return {
    NEXT_PUBLIC_DECK_COLORS: process.env.NEXT_PUBLIC_DECK_COLORS,
    NEXT_PUBLIC_SWIPE_THRESHOLD: process.env.NEXT_PUBLIC_SWIPE_THRESHOLD,
    NEXT_PUBLIC_MIN_PRESS_MS: process.env.NEXT_PUBLIC_MIN_PRESS_MS,
  };
}

function parseSetting<T>(
  name: keyof DeckEnv,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: string | undefined,
  fallback: T
): T {
  if (raw === undefined || !raw.trim()) return fallback;
  const result = schema.safeParse(raw);
  if (!result.success) {
    console.warn(`Invalid ${name}, falling back to default`, result.error.format());
    return fallback;
  }
  return result.data;
}

export function resolveDeckConfig(env: DeckEnv = readEnv()): DeckConfig {
  return {
    templates: parseSetting("NEXT_PUBLIC_DECK_COLORS", DeckColorsSchema, env.NEXT_PUBLIC_DECK_COLORS, DEFAULT_DECK),
    threshold: parseSetting(
      "NEXT_PUBLIC_SWIPE_THRESHOLD",
      SwipeThresholdSchema,
      env.NEXT_PUBLIC_SWIPE_THRESHOLD,
      DEFAULT_SWIPE_THRESHOLD
    ),
    minPressMs: parseSetting("NEXT_PUBLIC_MIN_PRESS_MS", MinPressSchema, env.NEXT_PUBLIC_MIN_PRESS_MS, DEFAULT_MIN_PRESS_MS),
  };
}
