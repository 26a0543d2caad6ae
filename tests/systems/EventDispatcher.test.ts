import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  GameplayEventType,
  QuestLifecycleEventType,
} from "../../src/shared/constants/EventEnums";
import { QuestStatus } from "../../src/shared/constants/QuestEnums";
import { createTestEngine, eventTypes, type TestEngine } from "../setup";

describe("EventDispatcher", () => {
  let t: TestEngine;

  beforeEach(() => {
    t = createTestEngine();
  });

  it("debe enrutar eventos de juego al motor", () => {
    t.engine.acceptQuest("p1", "intro_quest");

    const accepted = t.dispatcher.submitEvent("p1", {
      type: GameplayEventType.INTERACTED,
      npcId: "elder",
    });

    expect(accepted).toBe(true);
    expect(t.engine.getProgress("p1", "intro_quest")?.status).toBe(QuestStatus.COMPLETED);
    expect(t.dispatcher.getStats()).toEqual({
      accepted: 1,
      processed: 1,
      rejected: 0,
      overflowed: 0,
      failed: 0,
    });
  });

  it("debe aplicar la cantidad por defecto a objetos recogidos", () => {
    t.engine.acceptQuest("p1", "scroll_quest");

    t.dispatcher.submitEvent("p1", { type: GameplayEventType.ITEM_COLLECTED, itemId: "scroll" });

    expect(t.engine.getProgress("p1", "scroll_quest")).toMatchObject({
      status: QuestStatus.COMPLETED,
      progress: [1],
    });
  });

  it("debe descartar eventos malformados sin lanzar", () => {
    t.engine.acceptQuest("p1", "scroll_quest");

    expect(t.dispatcher.submitEvent("p1", { type: "teleported" })).toBe(false);
    expect(
      t.dispatcher.submitEvent("p1", {
        type: GameplayEventType.ITEM_COLLECTED,
        itemId: "scroll",
        quantity: -2,
      }),
    ).toBe(false);

    expect(t.engine.getProgress("p1", "scroll_quest")?.progress).toEqual([0]);
    expect(t.dispatcher.getStats().rejected).toBe(2);
  });

  it("debe procesar en orden los eventos enviados por suscriptores", () => {
    t.engine.acceptQuest("p1", "intro_quest");
    t.engine.acceptQuest("p1", "scroll_quest");
    t.events.length = 0;
    let pendingDuringHandler = -1;

    t.dispatcher.subscribe(QuestLifecycleEventType.QUEST_COMPLETED, (event) => {
      if (event.questId === "intro_quest") {
        t.dispatcher.submitEvent("p1", { type: GameplayEventType.ITEM_COLLECTED, itemId: "scroll" });
        pendingDuringHandler = t.dispatcher.getPendingCount("p1");
      }
    });

    t.dispatcher.submitEvent("p1", { type: GameplayEventType.INTERACTED, npcId: "elder" });

    expect(t.events.map((event) => [event.type, event.questId])).toEqual([
      [QuestLifecycleEventType.QUEST_OBJECTIVE_PROGRESSED, "intro_quest"],
      [QuestLifecycleEventType.QUEST_COMPLETED, "intro_quest"],
      [QuestLifecycleEventType.QUEST_OBJECTIVE_PROGRESSED, "scroll_quest"],
      [QuestLifecycleEventType.QUEST_COMPLETED, "scroll_quest"],
    ]);
    // Encolado detrás del evento en curso, no procesado de forma anidada.
    expect(pendingDuringHandler).toBe(1);
    expect(t.dispatcher.getPendingCount("p1")).toBe(0);
  });

  it("debe descartar eventos cuando la cola del jugador está llena", () => {
    t = createTestEngine({ config: { EVENT_QUEUE_CAPACITY: 1 } });
    t.engine.acceptQuest("p1", "intro_quest");
    const results: boolean[] = [];

    t.dispatcher.subscribe(QuestLifecycleEventType.QUEST_OBJECTIVE_PROGRESSED, () => {
      results.push(t.dispatcher.submitEvent("p1", { type: GameplayEventType.PLAYER_JOINED }));
      results.push(t.dispatcher.submitEvent("p1", { type: GameplayEventType.PLAYER_JOINED }));
    });

    t.dispatcher.submitEvent("p1", { type: GameplayEventType.INTERACTED, npcId: "elder" });

    expect(results).toEqual([true, false]);
    expect(t.dispatcher.getStats().overflowed).toBe(1);
  });

  it("debe registrar y descartar eventos en los que falla el motor", () => {
    vi.spyOn(t.engine, "handleGameplayEvent").mockImplementationOnce(() => {
      throw new Error("engine exploded");
    });

    expect(
      t.dispatcher.submitEvent("p1", { type: GameplayEventType.PLAYER_JOINED }),
    ).toBe(true);
    expect(t.dispatcher.getStats()).toMatchObject({ processed: 0, failed: 1 });

    t.dispatcher.submitEvent("p1", { type: GameplayEventType.PLAYER_JOINED });
    expect(eventTypes(t.events)).toEqual([
      QuestLifecycleEventType.QUEST_AVAILABLE,
      QuestLifecycleEventType.QUEST_AVAILABLE,
      QuestLifecycleEventType.QUEST_AVAILABLE,
    ]);
  });

  it("debe mantener el estado de cada jugador separado", () => {
    t.engine.acceptQuest("p1", "intro_quest");
    t.engine.acceptQuest("p2", "intro_quest");

    t.dispatcher.submitEvent("p1", { type: GameplayEventType.INTERACTED, npcId: "elder" });

    expect(t.engine.getProgress("p1", "intro_quest")?.status).toBe(QuestStatus.COMPLETED);
    expect(t.engine.getProgress("p2", "intro_quest")?.status).toBe(QuestStatus.ACTIVE);
  });
});
