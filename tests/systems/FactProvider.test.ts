import { describe, it, expect } from "vitest";
import { InMemoryFactProvider } from "../../src/domain/quests/systems/FactProvider";

describe("InMemoryFactProvider", () => {
  it("debe devolver valores por defecto para jugadores nuevos", () => {
    const facts = new InMemoryFactProvider(3);

    expect(facts.getSnapshot("p1")).toEqual({
      playerLevel: 3,
      completedQuests: new Set(),
      choices: {},
      attributes: {},
    });
  });

  it("debe reflejar los hechos registrados en cada snapshot", () => {
    const facts = new InMemoryFactProvider()
      .setLevel("p1", 12)
      .markCompleted("p1", "intro_quest")
      .recordChoice("p1", "moral_choice", "help_or_harm", "help")
      .setAttribute("p1", "reputation", 9);

    expect(facts.getSnapshot("p1")).toEqual({
      playerLevel: 12,
      completedQuests: new Set(["intro_quest"]),
      choices: { moral_choice: { help_or_harm: "help" } },
      attributes: { reputation: 9 },
    });
    expect(facts.getSnapshot("p2").playerLevel).toBe(1);
  });

  it("debe entregar copias que no alteran los hechos", () => {
    const facts = new InMemoryFactProvider().markCompleted("p1", "intro_quest");
    const snapshot = facts.getSnapshot("p1");

    if (snapshot.completedQuests instanceof Set) {
      snapshot.completedQuests.add("injected");
    }

    expect(facts.getSnapshot("p1").completedQuests).toEqual(new Set(["intro_quest"]));
  });
});
