import { createSchedulerApp } from "../composition/root";
import { buildCliErrorEnvelope, isDebugMode } from "./scheduler";

/** Prints the read-only diagnostic report as one JSON document. Exit code 2 when the store is unreachable. */
export const executeDiagnoseCli = async (): Promise<void> => {
  try {
    const app = createSchedulerApp();
    try {
      const report = await app.scheduler.runDiagnostic();
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(report, null, 2));
      if (!report.store.ok) process.exitCode = 2;
    } finally {
      await app.close();
    }
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode())));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeDiagnoseCli();
}
