#!/usr/bin/env node
import { runScan } from "../composition/root";
import { buildCliErrorEnvelope, isDebugMode } from "./errorEnvelope";

export const executeScanCli = async (): Promise<void> => {
  try {
    await runScan();
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeScanCli();
}
