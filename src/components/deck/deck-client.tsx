"use client";

import dynamic from "next/dynamic";
import type { DeckConfig } from "@/types/deck";

const SwipeDeck = dynamic(() => import("@/components/deck/swipe-deck").then((mod) => mod.SwipeDeck), {
  ssr: false,
  loading: () => <div className="deck-stack deck-stack--loading" aria-hidden="true" />,
});

type DeckClientProps = {
  config: DeckConfig;
};

export function DeckClient({ config }: DeckClientProps) {
  return (
    <section className="section deck-section">
      <SwipeDeck config={config} />
      <p className="deck-hint">Drag the top card left or right past the edge to swipe it away.</p>
    </section>
  );
}
