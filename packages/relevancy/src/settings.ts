import type { ObjectId, RelevancySettings } from "@mirrorsync/core";

export class RelevancySettingsStore {
  private settings = new Map<ObjectId, RelevancySettings>();
  private _version = 0;

  get version() {
    return this._version;
  }

  set(id: ObjectId, s: RelevancySettings) {
    this.settings.set(id, { ...s });
    this._version = (this._version + 1) >>> 0;
  }

  get(id: ObjectId): RelevancySettings | undefined {
    const s = this.settings.get(id);
    return s ? { ...s } : undefined;
  }

  has(id: ObjectId) {
    return this.settings.has(id);
  }

  remove(id: ObjectId): boolean {
    const removed = this.settings.delete(id);
    if (removed) this._version = (this._version + 1) >>> 0;
    return removed;
  }

  snapshot(): Map<ObjectId, RelevancySettings> {
    const out = new Map<ObjectId, RelevancySettings>();
    for (const [id, s] of this.settings) out.set(id, { ...s });
    return out;
  }

  size() {
    return this.settings.size;
  }
}
