import { EventBus, type PendingReplication } from "@mirrorsync/core";

// очередь живёт ровно один тик: drain забирает всё накопленное
export class ReplicationQueue {
  private bus = new EventBus<PendingReplication>();

  enqueue(entry: PendingReplication) {
    this.bus.emit(entry);
  }

  drain(): PendingReplication[] {
    return this.bus.drain();
  }

  size() {
    return this.bus.size();
  }
}
