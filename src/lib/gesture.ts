import type { DragState, GestureSnapshot, RemovalDirection, Translation } from "@/types/deck";

export const DEFAULT_SWIPE_THRESHOLD = 80;
export const DEFAULT_MIN_PRESS_MS = 10;

export const ZERO_TRANSLATION: Translation = { width: 0, height: 0 };

export type GestureEvent =
  | { type: "press" }
  | { type: "change"; translation: Translation }
  | { type: "end"; translation: Translation }
  | { type: "cancel" };

export type GestureResult = GestureSnapshot & {
  commit: boolean;
};

const INACTIVE: DragState = { kind: "inactive" };

export const INITIAL_GESTURE: GestureSnapshot = {
  drag: INACTIVE,
  removalDirection: "trailing",
};

export function dragTranslation(drag: DragState): Translation {
  return drag.kind === "dragging" ? drag.translation : ZERO_TRANSLATION;
}

export function isDragging(drag: DragState): boolean {
  return drag.kind === "dragging";
}

export function isPressing(drag: DragState): boolean {
  return drag.kind !== "inactive";
}

export function exceedsThreshold(translation: Translation, threshold: number): boolean {
  return Math.abs(translation.width) > threshold;
}

/** Sticky: returns `current` unless the drag is past the threshold on either side. */
export function resolveRemovalDirection(
  current: RemovalDirection,
  translation: Translation,
  threshold: number
): RemovalDirection {
  if (translation.width > threshold) return "trailing";
  if (translation.width < -threshold) return "leading";
  return current;
}

export function reduceGesture(snapshot: GestureSnapshot, event: GestureEvent, threshold: number): GestureResult {
  switch (event.type) {
    case "press":
      if (snapshot.drag.kind !== "inactive") return { ...snapshot, commit: false };
      return { ...snapshot, drag: { kind: "pressing" }, commit: false };

    case "change":
      if (snapshot.drag.kind === "inactive") return { ...snapshot, commit: false };
      return {
        drag: { kind: "dragging", translation: event.translation },
        removalDirection: resolveRemovalDirection(snapshot.removalDirection, event.translation, threshold),
        commit: false,
      };

    case "end": {
      if (snapshot.drag.kind === "inactive") return { ...snapshot, commit: false };
      const commit = exceedsThreshold(event.translation, threshold);
      return {
        drag: INACTIVE,
        removalDirection: commit
          ? resolveRemovalDirection(snapshot.removalDirection, event.translation, threshold)
          : snapshot.removalDirection,
        commit,
      };
    }

    case "cancel":
      return { ...snapshot, drag: INACTIVE, commit: false };
  }
}
