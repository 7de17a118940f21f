#!/usr/bin/env node
import { runWorker, type WorkerHandle } from "../composition/root";
import { logInfo } from "../shared/logging/log";
import { reportCliFailure } from "./errorEnvelope";

export const installShutdownHandlers = (
  handle: Pick<WorkerHandle, "stop">,
  exit: (code: number) => void = (code) => process.exit(code)
): (() => void) => {
  let stopping: Promise<void> | undefined;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    logInfo({ event: "worker.shutdown", signal });
    stopping = handle.stop().then(
      () => exit(0),
      (err: unknown) => {
        reportCliFailure("worker.failed", err);
        exit(1);
      }
    );
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  return () => {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  };
};

export const executeWorkerCli = async (): Promise<void> => {
  try {
    const handle = await runWorker();
    installShutdownHandlers(handle);
  } catch (err) {
    reportCliFailure("worker.failed", err);
    process.exit(1);
  }
};

if (require.main === module) {
  void executeWorkerCli();
}
