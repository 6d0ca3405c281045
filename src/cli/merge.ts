#!/usr/bin/env node
import { runMerge } from "../composition/root";
import { buildCliErrorEnvelope, isDebugMode } from "./errorEnvelope";

export const executeMergeCli = async (): Promise<void> => {
  try {
    await runMerge();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(buildCliErrorEnvelope(err, isDebugMode(), "merge.failed")));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeMergeCli();
}
