import type { Config, Logger } from "@mirrorsync/runtime";
import { ClientMirror, type ClientMirrorOptions } from "./mirror";
import { PredictionTracker } from "./prediction";
import { IdentityReconciler } from "./reconciler";

export interface MirrorClient {
  mirror: ClientMirror;
  prediction: PredictionTracker;
  reconciler: IdentityReconciler;
}

export interface MirrorClientOptions extends ClientMirrorOptions {
  logger?: Logger;
}

// клиентская сторона из той же конфигурации, что и авторитет
export function createMirrorClient(cfg: Pick<Config, "prediction">, opt: MirrorClientOptions = {}): MirrorClient {
  const mirror = new ClientMirror(opt);
  const prediction = new PredictionTracker(cfg.prediction.ackPolicy);
  const reconciler = new IdentityReconciler({
    mirror,
    prediction,
    ...(opt.logger ? { logger: opt.logger.child("client") } : {}),
  });
  return { mirror, prediction, reconciler };
}
