import { describe, it, expect, beforeEach } from "vitest";
import { ObjectiveTracker } from "../../src/domain/quests/systems/ObjectiveTracker";
import { QuestDefinitionRegistry } from "../../src/domain/quests/systems/QuestDefinitionRegistry";
import { GameplayEventType } from "../../src/shared/constants/EventEnums";
import { ObjectiveKind, QuestStatus } from "../../src/shared/constants/QuestEnums";
import type { QuestInstance } from "../../src/domain/types/quests/instances";

const registry = new QuestDefinitionRegistry([
  {
    id: "errand",
    name: "Errand",
    objectives: [
      { kind: ObjectiveKind.TALK_TO_NPC, target: "smith" },
      { kind: ObjectiveKind.COLLECT_ITEM, target: "ore", requiredCount: 3 },
      { kind: ObjectiveKind.MAKE_CHOICE, target: "keep_or_give", options: ["keep", "give"] },
      { kind: ObjectiveKind.RETURN_TO_NPC, target: "smith" },
    ],
  },
]);

function instance(overrides: Partial<QuestInstance> = {}): QuestInstance {
  return {
    questId: "errand",
    playerId: "p1",
    status: QuestStatus.ACTIVE,
    currentObjectiveIndex: 0,
    progress: [0, 0, 0, 0],
    choices: {},
    ...overrides,
  };
}

describe("ObjectiveTracker", () => {
  let tracker: ObjectiveTracker;

  beforeEach(() => {
    tracker = new ObjectiveTracker(registry);
  });

  it("debe avanzar un objetivo de hablar con un NPC", () => {
    expect(
      tracker.apply(instance(), { type: GameplayEventType.INTERACTED, npcId: "smith" }),
    ).toEqual({
      objectiveIndex: 0,
      previousProgress: 0,
      progress: 1,
      required: 1,
      satisfied: true,
      choice: undefined,
    });
  });

  it("debe ignorar eventos de otros NPCs", () => {
    expect(
      tracker.apply(instance(), { type: GameplayEventType.INTERACTED, npcId: "baker" }),
    ).toBeNull();
  });

  it("debe sumar la cantidad recogida hasta el máximo requerido", () => {
    const current = instance({ currentObjectiveIndex: 1, progress: [1, 1, 0, 0] });

    expect(
      tracker.apply(current, { type: GameplayEventType.ITEM_COLLECTED, itemId: "ore", quantity: 1 }),
    ).toMatchObject({ objectiveIndex: 1, previousProgress: 1, progress: 2, satisfied: false });
    expect(
      tracker.apply(current, { type: GameplayEventType.ITEM_COLLECTED, itemId: "ore", quantity: 10 }),
    ).toMatchObject({ progress: 3, required: 3, satisfied: true });
  });

  it("no debe aplicar eventos de objetivos posteriores", () => {
    expect(
      tracker.apply(instance(), { type: GameplayEventType.ITEM_COLLECTED, itemId: "ore", quantity: 3 }),
    ).toBeNull();
  });

  it("debe registrar la opción elegida", () => {
    const current = instance({ currentObjectiveIndex: 2, progress: [1, 3, 0, 0] });

    expect(
      tracker.apply(current, {
        type: GameplayEventType.CHOICE_MADE,
        choiceId: "keep_or_give",
        option: "give",
      }),
    ).toEqual({
      objectiveIndex: 2,
      previousProgress: 0,
      progress: 1,
      required: 1,
      satisfied: true,
      choice: { choiceId: "keep_or_give", option: "give" },
    });
  });

  it("debe ignorar opciones no declaradas", () => {
    const current = instance({ currentObjectiveIndex: 2, progress: [1, 3, 0, 0] });

    expect(
      tracker.apply(current, {
        type: GameplayEventType.CHOICE_MADE,
        choiceId: "keep_or_give",
        option: "sell",
      }),
    ).toBeNull();
  });

  it("debe completar un objetivo de volver al NPC con una interacción", () => {
    const current = instance({ currentObjectiveIndex: 3, progress: [1, 3, 1, 0] });

    expect(
      tracker.apply(current, { type: GameplayEventType.INTERACTED, npcId: "smith" }),
    ).toMatchObject({ objectiveIndex: 3, satisfied: true });
  });

  it("no debe producir cambios en instancias inactivas o ya al máximo", () => {
    const event = { type: GameplayEventType.INTERACTED, npcId: "smith" } as const;

    expect(tracker.apply(instance({ status: QuestStatus.COMPLETED }), event)).toBeNull();
    expect(tracker.apply(instance({ status: QuestStatus.AVAILABLE }), event)).toBeNull();
    expect(tracker.apply(instance({ progress: [1, 0, 0, 0] }), event)).toBeNull();
    expect(tracker.apply(instance(), { type: GameplayEventType.PLAYER_JOINED })).toBeNull();
  });

  it("no debe modificar la instancia recibida", () => {
    const current = instance();
    tracker.apply(current, { type: GameplayEventType.INTERACTED, npcId: "smith" });
    expect(current).toEqual(instance());
  });
});
