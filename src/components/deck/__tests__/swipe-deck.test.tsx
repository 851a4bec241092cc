import { act, fireEvent, render, screen, waitFor, within } from "@testing-library/react";
import { describe, expect, it } from "vitest";
import { SwipeDeck } from "@/components/deck/swipe-deck";
import { DEFAULT_DECK } from "@/lib/deck";

const START_X = 100;
const START_Y = 100;

function sequentialIds() {
  let index = 0;
  return () => {
    index += 1;
    return `card-${index}`;
  };
}

function renderDeck() {
  return render(
    <SwipeDeck config={{ templates: DEFAULT_DECK, threshold: 80, minPressMs: 0 }} createId={sequentialIds()} />
  );
}

function cardById(id: string): HTMLElement {
  const element = document.querySelector(`[data-card-id="${id}"]`);
  if (!(element instanceof HTMLElement)) {
    throw new Error(`Card ${id} is not rendered`);
  }
  return element;
}

// Cards still in the window; an exiting card is rendered but inert.
function windowIds(): string[] {
  return screen
    .getAllByTestId("deck-card")
    .filter((element) => element.style.pointerEvents !== "none")
    .map((element) => element.getAttribute("data-card-id") ?? "");
}

function dragState(): string | null {
  return document.querySelector(".deck-stack")?.getAttribute("data-drag-state") ?? null;
}

async function pause(ms = 20) {
  await act(async () => {
    await new Promise((resolve) => setTimeout(resolve, ms));
  });
}

async function pressAndMove(card: HTMLElement, deltaX: number, button = 0) {
  fireEvent.pointerDown(card, { pointerId: 1, pointerType: "mouse", button, clientX: START_X, clientY: START_Y });
  await pause();
  fireEvent.pointerMove(card, { pointerId: 1, pointerType: "mouse", clientX: START_X + deltaX, clientY: START_Y });
}

function release(card: HTMLElement, deltaX: number) {
  fireEvent.pointerUp(card, { pointerId: 1, pointerType: "mouse", clientX: START_X + deltaX, clientY: START_Y });
}

async function waitForExit(id: string) {
  await waitFor(() => expect(document.querySelector(`[data-card-id="${id}"]`)).toBeNull(), { timeout: 3000 });
}

describe("SwipeDeck", () => {
  it("renders the two visible cards with the first as top", () => {
    renderDeck();

    const cards = screen.getAllByTestId("deck-card");
    expect(cards).toHaveLength(2);
    expect(cards.map((card) => card.getAttribute("data-color"))).toEqual(["black", "red"]);
    expect(cards.map((card) => card.getAttribute("data-top"))).toEqual(["true", "false"]);
    expect(cards.map((card) => card.style.zIndex)).toEqual(["1", "0"]);
  });

  it("hides both indicators at rest", () => {
    renderDeck();

    for (const indicator of [...screen.getAllByTestId("reject-indicator"), ...screen.getAllByTestId("accept-indicator")]) {
      expect(indicator.style.opacity).toBe("0");
    }
  });

  it("tracks a drag on the top card and swipes it away past the threshold", async () => {
    renderDeck();
    const top = cardById("card-1");

    await pressAndMove(top, 120);
    expect(dragState()).toBe("dragging");
    expect(top.className).toBe("deck-card is-top is-pressed is-dragging");
    expect(within(top).getByTestId("accept-indicator").style.opacity).toBe("1");

    release(top, 120);

    expect(dragState()).toBe("inactive");
    expect(windowIds()).toEqual(["card-2", "card-3"]);
    expect(cardById("card-2").getAttribute("data-top")).toBe("true");
    expect(cardById("card-3").getAttribute("data-color")).toBe("green");
  });

  it("snaps back when released under the threshold", async () => {
    renderDeck();
    const top = cardById("card-1");

    await pressAndMove(top, 50);
    release(top, 50);

    expect(dragState()).toBe("inactive");
    expect(windowIds()).toEqual(["card-1", "card-2"]);
    expect(top.className).toBe("deck-card is-top");
  });

  it("ignores a non-primary mouse button", async () => {
    renderDeck();
    const top = cardById("card-1");

    await pressAndMove(top, 150, 2);
    release(top, 150);

    expect(dragState()).toBe("inactive");
    expect(windowIds()).toEqual(["card-1", "card-2"]);
  });

  it("gives the card behind the top card no gesture input", async () => {
    renderDeck();
    const behind = cardById("card-2");

    await pressAndMove(behind, 150);
    expect(dragState()).toBe("inactive");
    release(behind, 150);

    expect(windowIds()).toEqual(["card-1", "card-2"]);
  });

  it("treats pointercancel as a release without a swipe", async () => {
    renderDeck();
    const top = cardById("card-1");

    await pressAndMove(top, 150);
    fireEvent.pointerCancel(top, { pointerId: 1, pointerType: "mouse" });

    expect(dragState()).toBe("inactive");
    expect(windowIds()).toEqual(["card-1", "card-2"]);

    await pressAndMove(top, 100);
    release(top, 100);
    expect(windowIds()).toEqual(["card-2", "card-3"]);
  });

  it("treats a lost pointer capture as a cancel", async () => {
    renderDeck();
    const top = cardById("card-1");

    await pressAndMove(top, -150);
    fireEvent(top, new PointerEvent("lostpointercapture", { bubbles: true, pointerId: 1, pointerType: "mouse" }));

    expect(dragState()).toBe("inactive");
    expect(windowIds()).toEqual(["card-1", "card-2"]);
  });

  it("keeps the exiting card inert while it leaves", async () => {
    renderDeck();
    const first = cardById("card-1");

    await pressAndMove(first, 100);
    release(first, 100);

    expect(first.getAttribute("data-top")).toBe("false");
    expect(first.className).toBe("deck-card");
    expect(first.style.pointerEvents).toBe("none");

    await pressAndMove(first, 120);
    expect(dragState()).toBe("inactive");
    release(first, 120);

    expect(windowIds()).toEqual(["card-2", "card-3"]);
    expect(screen.getAllByTestId("deck-card").filter((card) => card.getAttribute("data-top") === "true")).toHaveLength(1);
  });

  it("accepts a new swipe once the exiting card has gone", async () => {
    renderDeck();
    const first = cardById("card-1");

    await pressAndMove(first, 100);
    release(first, 100);
    await pressAndMove(first, 120);
    release(first, 120);

    await waitForExit("card-1");
    await waitFor(() => expect(cardById("card-2").style.zIndex).toBe("1"), { timeout: 3000 });

    const second = cardById("card-2");
    await pressAndMove(second, 100);
    release(second, 100);

    expect(windowIds()).toEqual(["card-3", "card-4"]);
    expect(cardById("card-4").getAttribute("data-color")).toBe("yellow");
  });
});
