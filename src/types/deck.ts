import type { CardColor } from "@/lib/deck";

export type CardTemplate = {
  color: CardColor;
};

export type Card = {
  readonly id: string;
  readonly color: CardColor;
};

/** Index 0 is the interactive top card, index 1 the inert card behind it. */
export type DeckWindow = readonly [top: Card, next: Card];

export type ZOrderMap = Readonly<Record<string, number>>;

export type DeckState = {
  window: DeckWindow;
  lastIndex: number;
  zOrder: ZOrderMap;
};

export type Translation = {
  width: number;
  height: number;
};

export type DragState =
  | { kind: "inactive" }
  | { kind: "pressing" }
  | { kind: "dragging"; translation: Translation };

export type RemovalDirection = "trailing" | "leading";

export type GestureSnapshot = {
  drag: DragState;
  removalDirection: RemovalDirection;
};

export type CardVisuals = {
  isTop: boolean;
  offset: { x: number; y: number };
  scale: number;
  rotation: number;
  zIndex: number;
  rejectOpacity: number;
  acceptOpacity: number;
};

export type DeckConfig = {
  templates: CardTemplate[];
  threshold: number;
  minPressMs: number;
};
