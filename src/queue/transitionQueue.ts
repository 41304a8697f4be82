/**
 * 遷移キュー
 *
 * 評価ループとディスパッチパイプラインの間の有界キュー。
 * 同じインスタンスの遷移は最新のものだけを残して合流させる。
 * 満杯時に新しいインスタンスの遷移が来た場合は、溜まっている最古の
 * REFRESHED を追い出して場所を空ける。追い出せるものが無ければ
 * RESOLVED だけは容量を超えて受け付け、それ以外は捨てて件数を数える
 * （FIRING が続いていれば次の評価で再投入される）
 */

import { logger } from "../logger";
import { AlertTransition } from "../alerts/types";

export interface QueueStats {
  size: number;
  capacity: number;
  /** 受け付けた遷移の累計 */
  enqueued: number;
  /** 既存エントリに合流した遷移の累計 */
  coalesced: number;
  /** 満杯で捨てた遷移の累計 */
  dropped: number;
  /** 満杯時に追い出した REFRESHED の累計 */
  evicted: number;
}

export class TransitionQueue {
  /** インスタンスキー → 最新の遷移（挿入順を保持） */
  private entries = new Map<string, AlertTransition>();
  private enqueued = 0;
  private coalesced = 0;
  private dropped = 0;
  private evicted = 0;

  constructor(private readonly capacity: number) {
    if (!(capacity > 0)) {
      throw new RangeError(`Queue capacity must be positive (got ${capacity})`);
    }
  }

  /**
   * 遷移を投入する。捨てた場合は false
   */
  push(transition: AlertTransition): boolean {
    const key = transition.alert.key;

    if (this.entries.has(key)) {
      this.entries.set(key, transition);
      this.coalesced++;
      this.enqueued++;
      return true;
    }

    if (this.entries.size >= this.capacity && !this.evictRefreshed()) {
      if (transition.kind === "RESOLVED") {
        logger.warn("Transition queue full, accepting resolution over capacity", {
          key,
          capacity: this.capacity,
          size: this.entries.size + 1,
        });
        this.entries.set(key, transition);
        this.enqueued++;
        return true;
      }

      this.dropped++;
      logger.warn("Transition queue full, dropping transition", {
        key,
        kind: transition.kind,
        capacity: this.capacity,
        dropped: this.dropped,
      });
      return false;
    }

    this.entries.set(key, transition);
    this.enqueued++;
    return true;
  }

  /**
   * 最古の REFRESHED を 1 件取り除く。無ければ false
   */
  private evictRefreshed(): boolean {
    for (const [key, queued] of this.entries) {
      if (queued.kind === "REFRESHED") {
        this.entries.delete(key);
        this.evicted++;
        logger.debug("Transition queue full, evicted refresh", { key, evicted: this.evicted });
        return true;
      }
    }
    return false;
  }

  pushAll(transitions: readonly AlertTransition[]): number {
    let accepted = 0;
    for (const transition of transitions) {
      if (this.push(transition)) {
        accepted++;
      }
    }
    return accepted;
  }

  /**
   * 溜まっている遷移を投入順に取り出して空にする
   */
  drain(): AlertTransition[] {
    const drained = [...this.entries.values()];
    this.entries = new Map();
    return drained;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): QueueStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      enqueued: this.enqueued,
      coalesced: this.coalesced,
      dropped: this.dropped,
      evicted: this.evicted,
    };
  }
}
