import type { Card, CardVisuals, DeckWindow, DragState, RemovalDirection, ZOrderMap } from "@/types/deck";
import { isTopCard } from "@/lib/deck";
import { dragTranslation, isDragging } from "@/lib/gesture";

export const DRAG_SCALE = 0.95;
export const ROTATION_DIVISOR = 10;
export const CARD_SPRING = { type: "spring", stiffness: 180, damping: 100 } as const;
export const REMOVAL_DISTANCE = 1000;
export const REMOVAL_TIMING = { duration: 0.35, ease: "easeIn" } as const;

type VisualsInput = {
  window: DeckWindow;
  zOrder: ZOrderMap;
  drag: DragState;
  threshold: number;
};

export function computeCardVisuals(card: Card, { window, zOrder, drag, threshold }: VisualsInput): CardVisuals {
  const zIndex = zOrder[card.id] ?? 0;
  if (!isTopCard(window, card)) {
    return {
      isTop: false,
      offset: { x: 0, y: 0 },
      scale: 1,
      rotation: 0,
      zIndex,
      rejectOpacity: 0,
      acceptOpacity: 0,
    };
  }

  const { width, height } = dragTranslation(drag);
  return {
    isTop: true,
    offset: { x: width, y: height },
    scale: isDragging(drag) ? DRAG_SCALE : 1,
    rotation: width / ROTATION_DIVISOR,
    zIndex,
    rejectOpacity: width < -threshold ? 1 : 0,
    acceptOpacity: width > threshold ? 1 : 0,
  };
}

/** Exit target for the card being swiped away: off the bottom and toward the chosen edge. */
export function removalTransition(direction: RemovalDirection, distance = REMOVAL_DISTANCE) {
  return {
    x: direction === "trailing" ? distance : -distance,
    y: distance,
  };
}
