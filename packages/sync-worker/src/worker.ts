import { parentPort, workerData } from "node:worker_threads";
import { SyncConfigSchema } from "@wordsync/sync-core/src/config";
import { createSessionHost } from "./host";

const port = parentPort;
if (!port) throw new Error("sync worker must be started with new Worker()");

const config = SyncConfigSchema.partial().parse(workerData ?? {});
const host = createSessionHost({ config });

port.on("message", (message: unknown) => {
  port.postMessage(host.handle(message));
});
