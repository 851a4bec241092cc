"use client";

import { AnimatePresence } from "framer-motion";
import { useEffect, useRef, type PointerEvent } from "react";
import type { DeckConfig, Translation } from "@/types/deck";
import type { CardIdFactory } from "@/lib/deck";
import { useSwipeDeck } from "@/components/deck/use-swipe-deck";
import { DeckCard, type CardPointerHandlers } from "@/components/deck/deck-card";

type SwipeDeckProps = {
  config: DeckConfig;
  createId?: CardIdFactory;
};

type PointerOrigin = {
  cardId: string;
  pointerId: number;
  x: number;
  y: number;
};

function capturePointer(target: HTMLElement, pointerId: number) {
  try {
    target.setPointerCapture?.(pointerId);
  } catch (error) {
    console.warn("Pointer capture unavailable, tracking without it", error);
  }
}

function releasePointer(target: HTMLElement, pointerId: number) {
  try {
    if (target.hasPointerCapture?.(pointerId)) {
      target.releasePointerCapture(pointerId);
    }
  } catch (error) {
    console.warn("Pointer capture release failed", error);
  }
}

export function SwipeDeck({ config, createId }: SwipeDeckProps) {
  const deck = useSwipeDeck({ ...config, createId });
  const originRef = useRef<PointerOrigin | null>(null);
  const topCardId = deck.cards[0].id;
  const { cancel } = deck;

  // A gesture belongs to one card; drop it once that card is no longer on top.
  useEffect(() => {
    const origin = originRef.current;
    if (!origin || origin.cardId === topCardId) return;
    originRef.current = null;
    cancel();
  }, [topCardId, cancel]);

  function translationFor(event: PointerEvent<HTMLElement>): Translation | null {
    const origin = originRef.current;
    if (!origin || origin.pointerId !== event.pointerId || origin.cardId !== topCardId) return null;
    return { width: event.clientX - origin.x, height: event.clientY - origin.y };
  }

  function handlePointerDown(event: PointerEvent<HTMLElement>) {
    if (deck.isSettling) return;
    if (event.pointerType === "mouse" && event.button !== 0) return;
    const origin = originRef.current;
    if (origin && origin.cardId === topCardId) return;
    if (origin) {
      originRef.current = null;
      deck.cancel();
    }
    originRef.current = { cardId: topCardId, pointerId: event.pointerId, x: event.clientX, y: event.clientY };
    capturePointer(event.currentTarget, event.pointerId);
    deck.pressStart();
  }

  function handlePointerMove(event: PointerEvent<HTMLElement>) {
    const translation = translationFor(event);
    if (!translation) return;
    deck.dragChange(translation);
  }

  function handlePointerUp(event: PointerEvent<HTMLElement>) {
    const translation = translationFor(event);
    if (!translation) return;
    originRef.current = null;
    releasePointer(event.currentTarget, event.pointerId);
    deck.dragEnd(translation);
  }

  function handlePointerCancel(event: PointerEvent<HTMLElement>) {
    if (originRef.current?.pointerId !== event.pointerId) return;
    originRef.current = null;
    deck.cancel();
  }

  const handlers: CardPointerHandlers = {
    onPointerDown: handlePointerDown,
    onPointerMove: handlePointerMove,
    onPointerUp: handlePointerUp,
    onPointerCancel: handlePointerCancel,
  };

  return (
    <div className="deck-stack" data-drag-state={deck.drag.kind}>
      <AnimatePresence initial={false} custom={deck.removalDirection} onExitComplete={deck.settle}>
        {deck.rendered.map(({ card, visuals }) => (
          <DeckCard
            key={card.id}
            card={card}
            visuals={visuals}
            drag={deck.drag}
            removalDirection={deck.removalDirection}
            handlers={handlers}
          />
        ))}
      </AnimatePresence>
    </div>
  );
}
