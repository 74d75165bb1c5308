import { useEffect, useState } from "react";
import type { ShellConfig } from "@/config/shell-config";
import { BrowserShell } from "@/lib/browser-shell";
import { createCapacitorShellDeps } from "@/lib/capacitor-utils";
import type { ShellDeps, ShellPhase } from "@/lib/definitions";

export const useBrowserShell = (
  config: ShellConfig,
  createDeps: () => ShellDeps = createCapacitorShellDeps
) => {
  const [phase, setPhase] = useState<ShellPhase>("starting");
  const [awaitingUpload, setAwaitingUpload] = useState(false);

  useEffect(() => {
    const shell = new BrowserShell(config, createDeps());
    let active = true;

    const unsubscribeSlot = shell.fileChooser.slot.subscribe((state) => {
      if (active) setAwaitingUpload(state.pending !== null);
    });

    setPhase("starting");
    shell
      .onCreate()
      .then(() => {
        if (active) setPhase("loaded");
      })
      .catch((error) => {
        console.error("[BrowserShell] Startup failed:", error);
        if (active) setPhase("failed");
      });

    return () => {
      active = false;
      unsubscribeSlot();
      shell
        .dispose()
        .catch((error) =>
          console.error("[BrowserShell] Dispose failed:", error)
        );
    };
  }, [config, createDeps]);

  return { phase, awaitingUpload };
};
