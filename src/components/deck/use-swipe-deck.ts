"use client";

import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { Card, CardVisuals, DeckConfig, DeckState, GestureSnapshot, Translation } from "@/types/deck";
import { computeCardVisuals } from "@/lib/card-visuals";
import { advanceDeck, createDeckState, nextCardId, promoteTopCard, type CardIdFactory } from "@/lib/deck";
import { INITIAL_GESTURE, reduceGesture, type GestureEvent } from "@/lib/gesture";

// Promotes the new top card even if the exit animation never reports completion.
export const SETTLE_FALLBACK_MS = 1000;

export type UseSwipeDeckOptions = DeckConfig & {
  createId?: CardIdFactory;
};

export type RenderedCard = {
  card: Card;
  visuals: CardVisuals;
};

export function useSwipeDeck({ templates, threshold, minPressMs, createId = nextCardId }: UseSwipeDeckOptions) {
  const [deck, setDeck] = useState(() => createDeckState(templates, createId));
  const deckRef = useRef(deck);
  const [gesture, setGesture] = useState<GestureSnapshot>(INITIAL_GESTURE);
  const gestureRef = useRef<GestureSnapshot>(INITIAL_GESTURE);
  const pressTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);
  const settleTimerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const clearPressTimer = useCallback(() => {
    if (pressTimerRef.current) {
      clearTimeout(pressTimerRef.current);
      pressTimerRef.current = null;
    }
  }, []);

  const clearSettleTimer = useCallback(() => {
    if (settleTimerRef.current) {
      clearTimeout(settleTimerRef.current);
      settleTimerRef.current = null;
    }
  }, []);

  useEffect(
    () => () => {
      clearPressTimer();
      clearSettleTimer();
    },
    [clearPressTimer, clearSettleTimer]
  );

  const commitDeck = useCallback((next: DeckState) => {
    if (next === deckRef.current) return;
    deckRef.current = next;
    setDeck(next);
  }, []);

  // Runs once the evicted card has left the screen.
  const settle = useCallback(() => {
    clearSettleTimer();
    commitDeck(promoteTopCard(deckRef.current));
  }, [clearSettleTimer, commitDeck]);

  const dispatch = useCallback(
    (event: GestureEvent) => {
      const result = reduceGesture(gestureRef.current, event, threshold);
      const next: GestureSnapshot = { drag: result.drag, removalDirection: result.removalDirection };
      gestureRef.current = next;
      setGesture(next);
      if (result.commit) {
        commitDeck(advanceDeck(deckRef.current, templates, createId));
        clearSettleTimer();
        settleTimerRef.current = setTimeout(settle, SETTLE_FALLBACK_MS);
      }
    },
    [threshold, templates, createId, commitDeck, clearSettleTimer, settle]
  );

  const pressStart = useCallback(() => {
    if (gestureRef.current.drag.kind !== "inactive") return;
    clearPressTimer();
    pressTimerRef.current = setTimeout(() => {
      pressTimerRef.current = null;
      dispatch({ type: "press" });
    }, minPressMs);
  }, [clearPressTimer, dispatch, minPressMs]);

  const dragChange = useCallback((translation: Translation) => dispatch({ type: "change", translation }), [dispatch]);

  const dragEnd = useCallback(
    (translation: Translation) => {
      clearPressTimer();
      dispatch({ type: "end", translation });
    },
    [clearPressTimer, dispatch]
  );

  const cancel = useCallback(() => {
    clearPressTimer();
    dispatch({ type: "cancel" });
  }, [clearPressTimer, dispatch]);

  const rendered = useMemo<RenderedCard[]>(
    () =>
      deck.window.map((card) => ({
        card,
        visuals: computeCardVisuals(card, {
          window: deck.window,
          zOrder: deck.zOrder,
          drag: gesture.drag,
          threshold,
        }),
      })),
    [deck, gesture.drag, threshold]
  );

  return {
    cards: deck.window,
    lastIndex: deck.lastIndex,
    zOrder: deck.zOrder,
    drag: gesture.drag,
    isSettling: deck.zOrder[deck.window[0].id] !== 1,
    removalDirection: gesture.removalDirection,
    rendered,
    pressStart,
    dragChange,
    dragEnd,
    cancel,
    settle,
  };
}
