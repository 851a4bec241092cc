import type { Card, CardTemplate, DeckState, DeckWindow, ZOrderMap } from "@/types/deck";

export const CARD_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "accent",
  "brown",
  "blue",
  "orange",
  "purple",
  "pink",
  "teal",
  "gray",
] as const;
export type CardColor = (typeof CARD_COLORS)[number];

export const DEFAULT_DECK: CardTemplate[] = [
  { color: "black" },
  { color: "red" },
  { color: "green" },
  { color: "yellow" },
  { color: "accent" },
  { color: "brown" },
];

export type CardIdFactory = () => string;

let cardCounter = 0;
export function nextCardId(): string {
  cardCounter += 1;
  return `card-${Date.now()}-${cardCounter}`;
}

export function templateAt(templates: readonly CardTemplate[], index: number): CardTemplate {
  const size = templates.length;
  const template = templates[((index % size) + size) % size];
  if (!template) {
    throw new Error("Deck requires at least one card template");
  }
  return template;
}

function drawCard(templates: readonly CardTemplate[], index: number, createId: CardIdFactory): Card {
  return { id: createId(), color: templateAt(templates, index).color };
}

function stackingFor(window: DeckWindow, topValue: number, nextValue: number): ZOrderMap {
  return { [window[0].id]: topValue, [window[1].id]: nextValue };
}

export function createDeckState(templates: readonly CardTemplate[], createId: CardIdFactory = nextCardId): DeckState {
  if (!templates.length) {
    throw new Error("Deck requires at least one card template");
  }
  const window: DeckWindow = [drawCard(templates, 0, createId), drawCard(templates, 1, createId)];
  return {
    window,
    lastIndex: 1,
    zOrder: stackingFor(window, 1, 0),
  };
}

/**
 * Evicts the top card and appends a fresh card from the next template.
 * The promoted card sits at 0 and the appended card at -1 until
 * {@link promoteTopCard} runs once the removal animation has finished.
 */
export function advanceDeck(
  state: DeckState,
  templates: readonly CardTemplate[],
  createId: CardIdFactory = nextCardId
): DeckState {
  const lastIndex = (state.lastIndex + 1) % templates.length;
  const window: DeckWindow = [state.window[1], drawCard(templates, lastIndex, createId)];
  return {
    window,
    lastIndex,
    zOrder: stackingFor(window, 0, -1),
  };
}

export function promoteTopCard(state: DeckState): DeckState {
  const [top, next] = state.window;
  if (state.zOrder[top.id] === 1 && state.zOrder[next.id] === 0) return state;
  return { ...state, zOrder: stackingFor(state.window, 1, 0) };
}

export function isTopCard(window: DeckWindow, card: Card): boolean {
  return window[0].id === card.id;
}
