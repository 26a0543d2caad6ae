import { describe, it, expect } from "vitest";
import { CONFIG, loadConfig } from "../../src/config/config";
import { QuestConfigurationError } from "../../src/domain/quests/core/errors";

describe("Config", () => {
  it("debe tener valores por defecto", () => {
    expect(loadConfig({})).toEqual({
      MAX_ACTIVE_QUESTS: 5,
      EVENT_QUEUE_CAPACITY: 256,
    });
  });

  it("debe usar valores de entorno cuando están disponibles", () => {
    const config = loadConfig({
      MAX_ACTIVE_QUESTS: "3",
      EVENT_QUEUE_CAPACITY: "16",
      QUEST_CATALOG_PATH: "./catalog.json",
    });

    expect(config).toEqual({
      MAX_ACTIVE_QUESTS: 3,
      EVENT_QUEUE_CAPACITY: 16,
      QUEST_CATALOG_PATH: "./catalog.json",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("debe tratar variables vacías como no definidas", () => {
    expect(loadConfig({ MAX_ACTIVE_QUESTS: "", QUEST_CATALOG_PATH: "" })).toEqual({
      MAX_ACTIVE_QUESTS: 5,
      EVENT_QUEUE_CAPACITY: 256,
    });
  });

  it("debe fallar listando todas las variables inválidas", () => {
    let caught: unknown;
    try {
      loadConfig({ MAX_ACTIVE_QUESTS: "0", EVENT_QUEUE_CAPACITY: "many" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(QuestConfigurationError);
    if (caught instanceof QuestConfigurationError) {
      expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual([
        "MAX_ACTIVE_QUESTS",
        "EVENT_QUEUE_CAPACITY",
      ]);
    }
  });

  it("debe exponer la configuración cargada del entorno", () => {
    expect(CONFIG.MAX_ACTIVE_QUESTS).toBeGreaterThan(0);
    expect(CONFIG.EVENT_QUEUE_CAPACITY).toBeGreaterThan(0);
  });
});
