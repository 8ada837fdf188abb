// Tests for readiness lifecycle events and handler helpers

import { describe, it, expect, vi } from "vitest";
import { Loadable } from "../src/runtime/loadable";
import {
  onLoadEvent,
  emitLoadEvent,
  hasLoadEventHandlers,
  clearLoadEventHandlers,
} from "../src/runtime/events";
import {
  combineHandlers,
  filterEvents,
  createConsoleHandler,
} from "../src/runtime/event-handlers";
import {
  LoadEventTypes,
  type LoadEvent,
  type LoadCheckEndEvent,
} from "../src/types/events";

function collect(): LoadEvent[] {
  const events: LoadEvent[] = [];
  onLoadEvent((event) => events.push(event));
  return events;
}

function endEvent(overrides: Partial<LoadCheckEndEvent>): LoadCheckEndEvent {
  return {
    type: LoadEventTypes.LOAD_CHECK_END,
    host: "CheckoutPage",
    passed: true,
    cached: false,
    validationsRun: 2,
    durationMs: 4,
    timestamp: 0,
    ...overrides,
  };
}

describe("load events", () => {
  it("should emit start, one end per validation, then end", () => {
    class Widget extends Loadable {}
    Widget.loadValidation(() => true, { name: "visible" });
    Widget.loadValidation(() => true, { name: "enabled" });
    const events = collect();

    new Widget().isLoaded();

    expect(events.map((e) => e.type)).toEqual([
      LoadEventTypes.LOAD_CHECK_START,
      LoadEventTypes.VALIDATION_END,
      LoadEventTypes.VALIDATION_END,
      LoadEventTypes.LOAD_CHECK_END,
    ]);
    expect(events[1]).toMatchObject({
      host: "Widget",
      index: 0,
      name: "visible",
      passed: true,
    });
    expect(events[2]).toMatchObject({ index: 1, name: "enabled" });
    expect(events[3]).toMatchObject({
      passed: true,
      cached: false,
      validationsRun: 2,
    });
  });

  it("should stop emitting validation events at the first failure", () => {
    class Widget extends Loadable {}
    Widget.loadValidation(() => [false, "Spinner still visible"], {
      name: "spinnerGone",
    });
    Widget.loadValidation(() => true, { name: "never" });
    const events = collect();

    new Widget().isLoaded();

    expect(events).toHaveLength(3);
    expect(events[1]).toMatchObject({
      type: LoadEventTypes.VALIDATION_END,
      name: "spinnerGone",
      passed: false,
      message: "Spinner still visible",
    });
    expect(events[2]).toMatchObject({
      type: LoadEventTypes.LOAD_CHECK_END,
      passed: false,
      loadError: "Spinner still visible",
      validationsRun: 1,
    });
  });

  it("should mark checks answered from the cache", () => {
    class Widget extends Loadable {}
    Widget.loadValidation(() => true);
    const events = collect();

    new Widget().whenLoaded((w) => w.isLoaded());

    expect(events.map((e) => e.type)).toEqual([
      LoadEventTypes.LOAD_CHECK_START,
      LoadEventTypes.VALIDATION_END,
      LoadEventTypes.LOAD_CHECK_END,
      LoadEventTypes.LOAD_CHECK_START,
      LoadEventTypes.LOAD_CHECK_END,
    ]);
    expect(events[3]).toMatchObject({ cached: true });
    expect(events[4]).toMatchObject({
      cached: true,
      passed: true,
      validationsRun: 0,
    });
  });

  it("should stop delivering events after unsubscribing", () => {
    class Widget extends Loadable {}
    const events: LoadEvent[] = [];
    const off = onLoadEvent((event) => events.push(event));

    off();
    new Widget().isLoaded();

    expect(events).toEqual([]);
    expect(hasLoadEventHandlers()).toBe(false);
  });

  it("should log handler errors without failing the check", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    class Widget extends Loadable {}
    onLoadEvent(() => {
      throw new Error("sink offline");
    });

    expect(new Widget().isLoaded()).toBe(true);
    expect(error).toHaveBeenCalledWith(
      "Load event handler error for LOAD_CHECK_START:",
      "sink offline",
    );
  });

  it("should clear every handler", () => {
    onLoadEvent(() => {});
    onLoadEvent(() => {});

    clearLoadEventHandlers();

    expect(hasLoadEventHandlers()).toBe(false);
  });
});

describe("combineHandlers()", () => {
  it("should call every handler and isolate failures", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const seen: string[] = [];
    const handler = combineHandlers(
      () => {
        throw new Error("first broke");
      },
      (event) => seen.push(event.type),
    );

    handler(endEvent({}));

    expect(seen).toEqual([LoadEventTypes.LOAD_CHECK_END]);
    expect(error).toHaveBeenCalledWith(
      "Load event handler error for LOAD_CHECK_END:",
      "first broke",
    );
  });

  it("should return the handler itself when given one", () => {
    const only = (): void => {};

    expect(combineHandlers(only)).toBe(only);
  });
});

describe("filterEvents()", () => {
  it("should only forward the selected event types", () => {
    const seen: string[] = [];
    onLoadEvent(
      filterEvents([LoadEventTypes.LOAD_CHECK_END], (event) =>
        seen.push(event.type),
      ),
    );

    emitLoadEvent({
      type: LoadEventTypes.LOAD_CHECK_START,
      host: "Widget",
      cached: false,
      timestamp: 0,
    });
    emitLoadEvent(endEvent({}));

    expect(seen).toEqual([LoadEventTypes.LOAD_CHECK_END]);
  });
});

describe("createConsoleHandler()", () => {
  it("should log one line per finished check", () => {
    const lines: string[] = [];
    const handler = createConsoleHandler({ log: (line) => lines.push(line) });

    handler({
      type: LoadEventTypes.LOAD_CHECK_START,
      host: "CheckoutPage",
      cached: false,
      timestamp: 0,
    });
    handler(endEvent({}));
    handler(
      endEvent({
        passed: false,
        loadError: "Expected /cart to match /checkout/ but it did not.",
      }),
    );
    handler(endEvent({ passed: false, validationsRun: 1, durationMs: 0 }));
    handler(endEvent({ cached: true, validationsRun: 0 }));

    expect(lines).toEqual([
      "[loadable] CheckoutPage loaded after 2 validation(s) in 4ms",
      "[loadable] CheckoutPage not loaded after 2 validation(s) in 4ms: Expected /cart to match /checkout/ but it did not.",
      "[loadable] CheckoutPage not loaded after 1 validation(s) in 0ms",
      "[loadable] CheckoutPage loaded (cached)",
    ]);
  });

  it("should skip passing checks when failuresOnly is set", () => {
    const lines: string[] = [];
    const handler = createConsoleHandler({
      failuresOnly: true,
      log: (line) => lines.push(line),
    });

    handler(endEvent({}));
    handler(endEvent({ passed: false }));

    expect(lines).toEqual([
      "[loadable] CheckoutPage not loaded after 2 validation(s) in 4ms",
    ]);
  });

  it("should default to console.log", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    createConsoleHandler()(endEvent({ cached: true }));

    expect(log).toHaveBeenCalledWith("[loadable] CheckoutPage loaded (cached)");
  });
});
