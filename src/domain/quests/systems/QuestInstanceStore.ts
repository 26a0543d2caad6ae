import { injectable } from "inversify";
import { QuestStatus } from "../../../shared/constants/QuestEnums";
import type { PlayerId, QuestId } from "../../types/quests/identifiers";
import type {
  PendingReward,
  QuestInstance,
  QuestInstanceSnapshot,
} from "../../types/quests/instances";

interface PlayerRecord {
  instances: Map<QuestId, QuestInstance>;
  /** Instances replaced by a new attempt of a repeatable quest */
  history: QuestInstance[];
  pendingRewards: PendingReward[];
  /** Quests announced as available and not since withdrawn */
  announced: Set<QuestId>;
}

export function cloneInstance(instance: QuestInstanceSnapshot): QuestInstance {
  return {
    ...instance,
    progress: [...instance.progress],
    choices: { ...instance.choices },
  };
}

/**
 * Per-player quest progress records keyed by (player, quest id).
 *
 * The store hands out copies; only `save` replaces a stored instance, which
 * lets the engine build a transition on a copy and commit it in one step.
 * Iteration follows insertion order, i.e. the order quests were engaged.
 */
@injectable()
export class QuestInstanceStore {
  private players = new Map<PlayerId, PlayerRecord>();

  private record(playerId: PlayerId): PlayerRecord {
    let record = this.players.get(playerId);
    if (!record) {
      record = {
        instances: new Map(),
        history: [],
        pendingRewards: [],
        announced: new Set(),
      };
      this.players.set(playerId, record);
    }
    return record;
  }

  public get(playerId: PlayerId, questId: QuestId): QuestInstance | undefined {
    const instance = this.players.get(playerId)?.instances.get(questId);
    return instance ? cloneInstance(instance) : undefined;
  }

  public save(instance: QuestInstance): void {
    this.record(instance.playerId).instances.set(
      instance.questId,
      cloneInstance(instance),
    );
  }

  /**
   * Moves the current instance for the quest into history.
   */
  public archive(playerId: PlayerId, questId: QuestId): void {
    const record = this.players.get(playerId);
    const instance = record?.instances.get(questId);
    if (!record || !instance) return;
    record.history.push(instance);
    record.instances.delete(questId);
  }

  public list(playerId: PlayerId): QuestInstance[] {
    const record = this.players.get(playerId);
    if (!record) return [];
    return Array.from(record.instances.values(), cloneInstance);
  }

  public listByStatus(playerId: PlayerId, status: QuestStatus): QuestInstance[] {
    return this.list(playerId).filter((instance) => instance.status === status);
  }

  public countByStatus(playerId: PlayerId, status: QuestStatus): number {
    const record = this.players.get(playerId);
    if (!record) return 0;
    let count = 0;
    for (const instance of record.instances.values()) {
      if (instance.status === status) count++;
    }
    return count;
  }

  public getHistory(playerId: PlayerId): QuestInstance[] {
    return (this.players.get(playerId)?.history ?? []).map(cloneInstance);
  }

  public addPendingReward(playerId: PlayerId, reward: PendingReward): void {
    this.record(playerId).pendingRewards.push({
      ...reward,
      rewards: { ...reward.rewards },
    });
  }

  public getPendingRewards(playerId: PlayerId): PendingReward[] {
    return (this.players.get(playerId)?.pendingRewards ?? []).map((reward) => ({
      ...reward,
      rewards: { ...reward.rewards },
    }));
  }

  public drainPendingRewards(playerId: PlayerId): PendingReward[] {
    const record = this.players.get(playerId);
    if (!record) return [];
    return record.pendingRewards.splice(0);
  }

  public isAnnounced(playerId: PlayerId, questId: QuestId): boolean {
    return this.players.get(playerId)?.announced.has(questId) ?? false;
  }

  public setAnnounced(
    playerId: PlayerId,
    questId: QuestId,
    announced: boolean,
  ): void {
    const record = this.record(playerId);
    if (announced) {
      record.announced.add(questId);
    } else {
      record.announced.delete(questId);
    }
  }

  /**
   * Replaces everything stored for a player. Availability announcements are
   * reset so the next sweep re-announces what is available.
   */
  public replacePlayer(
    playerId: PlayerId,
    state: {
      instances: QuestInstance[];
      history: QuestInstance[];
      pendingRewards: PendingReward[];
    },
  ): void {
    this.players.set(playerId, {
      instances: new Map(
        state.instances.map((instance) => [instance.questId, cloneInstance(instance)]),
      ),
      history: state.history.map(cloneInstance),
      pendingRewards: state.pendingRewards.map((reward) => ({
        ...reward,
        rewards: { ...reward.rewards },
      })),
      announced: new Set(),
    });
  }

  public listPlayers(): PlayerId[] {
    return Array.from(this.players.keys());
  }

  public clear(playerId?: PlayerId): void {
    if (playerId === undefined) {
      this.players.clear();
    } else {
      this.players.delete(playerId);
    }
  }
}
