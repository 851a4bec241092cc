import { CircleX, Heart } from "lucide-react";

type CardOverlayProps = {
  rejectOpacity: number;
  acceptOpacity: number;
};

export function CardOverlay({ rejectOpacity, acceptOpacity }: CardOverlayProps) {
  return (
    <div className="deck-card__overlay" aria-hidden="true">
      <span className="deck-card__indicator is-reject" data-testid="reject-indicator" style={{ opacity: rejectOpacity }}>
        <CircleX size={100} />
      </span>
      <span className="deck-card__indicator is-accept" data-testid="accept-indicator" style={{ opacity: acceptOpacity }}>
        <Heart size={100} />
      </span>
    </div>
  );
}
