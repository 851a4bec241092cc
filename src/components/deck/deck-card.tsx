"use client";

import { motion, useIsPresent, type Variants } from "framer-motion";
import type { PointerEventHandler } from "react";
import type { Card, CardVisuals, DragState, RemovalDirection } from "@/types/deck";
import { CARD_SPRING, REMOVAL_TIMING, removalTransition } from "@/lib/card-visuals";
import { isDragging, isPressing } from "@/lib/gesture";
import { CardOverlay } from "@/components/deck/card-overlay";

export type CardPointerHandlers = {
  onPointerDown: PointerEventHandler<HTMLElement>;
  onPointerMove: PointerEventHandler<HTMLElement>;
  onPointerUp: PointerEventHandler<HTMLElement>;
  onPointerCancel: PointerEventHandler<HTMLElement>;
};

type DeckCardProps = {
  card: Card;
  visuals: CardVisuals;
  drag: DragState;
  removalDirection: RemovalDirection;
  handlers: CardPointerHandlers;
};

const cardVariants: Variants = {
  exit: (direction: RemovalDirection) => ({
    ...removalTransition(direction),
    transition: REMOVAL_TIMING,
  }),
};

export function DeckCard({ card, visuals, drag, removalDirection, handlers }: DeckCardProps) {
  // A card playing its exit keeps the props it had as top card.
  const isPresent = useIsPresent();
  const interactive = visuals.isTop && isPresent;
  const classNames = ["deck-card"];
  if (interactive) classNames.push("is-top");
  if (interactive && isPressing(drag)) classNames.push("is-pressed");
  if (interactive && isDragging(drag)) classNames.push("is-dragging");

  return (
    <motion.div
      className={classNames.join(" ")}
      data-testid="deck-card"
      data-card-id={card.id}
      data-color={card.color}
      data-top={interactive ? "true" : "false"}
      custom={removalDirection}
      variants={cardVariants}
      initial={false}
      animate={{ x: visuals.offset.x, y: visuals.offset.y, scale: visuals.scale, rotate: visuals.rotation }}
      exit="exit"
      transition={CARD_SPRING}
      style={{ zIndex: visuals.zIndex, pointerEvents: isPresent ? undefined : "none" }}
      onPointerDown={interactive ? handlers.onPointerDown : undefined}
      onPointerMove={interactive ? handlers.onPointerMove : undefined}
      onPointerUp={interactive ? handlers.onPointerUp : undefined}
      onPointerCancel={interactive ? handlers.onPointerCancel : undefined}
      onLostPointerCapture={interactive ? handlers.onPointerCancel : undefined}
    >
      <CardOverlay
        rejectOpacity={interactive ? visuals.rejectOpacity : 0}
        acceptOpacity={interactive ? visuals.acceptOpacity : 0}
      />
    </motion.div>
  );
}
