import { DeckClient } from "@/components/deck/deck-client";
import { resolveDeckConfig } from "@/lib/config";

export default function HomePage() {
  const config = resolveDeckConfig();
  return <DeckClient config={config} />;
}
