import { createInterruptHandler, runSyncCli, type ActiveSyncRun } from "./syncInventoryCostCli";

const active: ActiveSyncRun = { store: null };

const onInterrupt = createInterruptHandler(active, (code) => process.exit(code));
process.once("SIGINT", () => {
  void onInterrupt();
});

runSyncCli(process.argv.slice(2), undefined, active).then((code) => {
  process.exitCode = code;
});
