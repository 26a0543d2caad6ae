import { describe, it, expect, beforeEach, vi } from "vitest";
import { LifecycleEventBus } from "../../src/domain/quests/core/LifecycleEventBus";
import { logger } from "../../src/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "../../src/shared/constants/LogEnums";
import { QuestLifecycleEventType } from "../../src/shared/constants/EventEnums";

const accepted = {
  type: QuestLifecycleEventType.QUEST_ACCEPTED,
  playerId: "p1",
  questId: "intro_quest",
  timestamp: 10,
} as const;

describe("LifecycleEventBus", () => {
  let bus: LifecycleEventBus;

  beforeEach(() => {
    bus = new LifecycleEventBus();
    logger.clear();
  });

  describe("queueEvent", () => {
    it("debe encolar sin entregar hasta el flush", () => {
      const listener = vi.fn();
      bus.subscribe(QuestLifecycleEventType.QUEST_ACCEPTED, listener);

      const stamped = bus.queueEvent(accepted);

      expect(stamped).toEqual({ ...accepted, sequence: 1 });
      expect(bus.getQueueSize()).toBe(1);
      expect(listener).not.toHaveBeenCalled();

      expect(bus.flushEvents()).toEqual([{ ...accepted, sequence: 1 }]);
      expect(listener).toHaveBeenCalledWith({ ...accepted, sequence: 1 });
      expect(bus.getQueueSize()).toBe(0);
      expect(bus.getDeliveredCount()).toBe(1);
    });

    it("debe descartar la cola sin entregar", () => {
      const listener = vi.fn();
      bus.subscribeAll(listener);

      bus.queueEvent(accepted);
      bus.discardQueued();

      expect(bus.flushEvents()).toEqual([]);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("suscripciones", () => {
    it("debe entregar cada evento a su canal y al canal general", () => {
      const typed = vi.fn();
      const all = vi.fn();
      bus.subscribe(QuestLifecycleEventType.QUEST_FAILED, typed);
      bus.subscribeAll(all);

      bus.queueEvent(accepted);
      bus.queueEvent({
        type: QuestLifecycleEventType.QUEST_FAILED,
        playerId: "p1",
        questId: "intro_quest",
        timestamp: 11,
        reason: "timeout",
      });
      bus.flushEvents();

      expect(typed).toHaveBeenCalledTimes(1);
      expect(all).toHaveBeenCalledTimes(2);
      expect(all.mock.calls.map(([event]) => event.sequence)).toEqual([1, 2]);
    });

    it("debe entregar en orden los eventos encolados por un suscriptor", () => {
      const seen: number[] = [];
      const nestedResults: unknown[] = [];
      bus.subscribeAll((event) => {
        seen.push(event.sequence);
        if (event.sequence === 1) {
          bus.queueEvent({ ...accepted, questId: "advanced_quest" });
          nestedResults.push(bus.flushEvents());
        }
      });

      bus.queueEvent(accepted);
      bus.queueEvent({ ...accepted, questId: "scroll_quest" });
      const delivered = bus.flushEvents();

      expect(seen).toEqual([1, 2, 3]);
      expect(nestedResults).toEqual([[]]);
      expect(delivered.map((event) => event.questId)).toEqual([
        "intro_quest",
        "scroll_quest",
        "advanced_quest",
      ]);
      expect(bus.getQueueSize()).toBe(0);
    });

    it("debe permitir cancelar la suscripción", () => {
      const listener = vi.fn();
      const unsubscribe = bus.subscribeAll(listener);

      unsubscribe();
      bus.queueEvent(accepted);
      bus.flushEvents();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("aislamiento de suscriptores", () => {
    it("debe seguir entregando cuando un suscriptor lanza", () => {
      const after = vi.fn();
      bus.subscribeAll(() => {
        throw new Error("subscriber down");
      });
      bus.subscribeAll(after);

      bus.queueEvent(accepted);
      expect(() => bus.flushEvents()).not.toThrow();

      expect(after).toHaveBeenCalledTimes(1);
      expect(
        logger.queryLogs({ levels: [LogLevel.ERROR], categories: [LogCategory.EVENTS] }),
      ).toMatchObject([
        {
          message: "Lifecycle subscriber failed on quest:*",
          data: { error: "subscriber down" },
        },
      ]);
    });

    it("debe registrar promesas rechazadas de suscriptores", async () => {
      bus.subscribe(QuestLifecycleEventType.QUEST_ACCEPTED, async () => {
        throw new Error("async failure");
      });

      bus.queueEvent(accepted);
      bus.flushEvents();
      await new Promise((resolve) => setImmediate(resolve));

      expect(logger.queryLogs({ levels: [LogLevel.ERROR] })).toMatchObject([
        {
          message: "Lifecycle subscriber failed on quest:accepted",
          data: { error: "async failure" },
        },
      ]);
    });
  });
});
