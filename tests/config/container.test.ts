import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createQuestContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import { QuestConfigurationError } from "../../src/domain/quests/core/errors";
import type { QuestEngine } from "../../src/domain/quests/systems/QuestEngine";
import type { EventDispatcher } from "../../src/domain/quests/systems/EventDispatcher";
import type { QuestDefinitionRegistry } from "../../src/domain/quests/systems/QuestDefinitionRegistry";
import {
  defaultQuestCatalog,
  loadQuestCatalog,
} from "../../src/domain/quests/systems/QuestCatalogLoader";
import { ObjectiveKind } from "../../src/shared/constants/QuestEnums";

describe("createQuestContainer", () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  function writeCatalog(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "quest-catalog-"));
    tempDirs.push(dir);
    const file = path.join(dir, "catalog.json");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("debe resolver el motor con el catálogo incluido", () => {
    const container = createQuestContainer();
    const registry = container.get<QuestDefinitionRegistry>(TYPES.QuestDefinitionRegistry);

    expect(registry.size).toBe(8);
    expect(registry.getFollowUp("moral_choice", "harm")).toBe("harm_follow_up");
  });

  it("debe registrar los componentes como singletons", () => {
    const container = createQuestContainer();

    expect(container.get<QuestEngine>(TYPES.QuestEngine)).toBe(
      container.get<QuestEngine>(TYPES.QuestEngine),
    );
    expect(container.get<EventDispatcher>(TYPES.EventDispatcher)).toBeDefined();
  });

  it("debe crear contenedores independientes", () => {
    const first = createQuestContainer();
    const second = createQuestContainer();

    first.get<QuestEngine>(TYPES.QuestEngine).acceptQuest("p1", "intro_quest");

    expect(second.get<QuestEngine>(TYPES.QuestEngine).listActiveQuests("p1")).toEqual([]);
  });

  it("debe cargar el catálogo indicado en la configuración", () => {
    const file = writeCatalog(
      JSON.stringify([
        { id: "only", name: "Only", objectives: [{ kind: ObjectiveKind.TALK_TO_NPC, target: "npc" }] },
      ]),
    );

    const container = createQuestContainer({ config: { QUEST_CATALOG_PATH: file } });
    const registry = container.get<QuestDefinitionRegistry>(TYPES.QuestDefinitionRegistry);

    expect(registry.list().map((definition) => definition.id)).toEqual(["only"]);
  });

  it("debe fallar al arrancar con un catálogo inválido", () => {
    const container = createQuestContainer({ definitions: [{ id: "broken" }] });

    expect(() => container.get(TYPES.QuestDefinitionRegistry)).toThrow(QuestConfigurationError);
  });

  it("debe rechazar ficheros de catálogo ilegibles o mal formados", () => {
    expect(() => loadQuestCatalog(writeCatalog("{ not json"))).toThrow(QuestConfigurationError);
    expect(() => loadQuestCatalog(writeCatalog('{"id":"x"}'))).toThrow(
      QuestConfigurationError,
    );
    expect(() => loadQuestCatalog(path.join(os.tmpdir(), "missing-catalog.json"))).toThrow(
      QuestConfigurationError,
    );
  });

  it("debe devolver una copia independiente del catálogo incluido", () => {
    const first = defaultQuestCatalog();
    first.pop();

    expect(defaultQuestCatalog()).toHaveLength(8);
  });
});
