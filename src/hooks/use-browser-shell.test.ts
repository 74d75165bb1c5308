// @vitest-environment jsdom
import { act, cleanup, renderHook, waitFor } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeShellDeps, flushPromises } from "@/_tests/helpers/fake-shell";
import { DEFAULT_SHELL_CONFIG } from "@/config/shell-config";
import { useBrowserShell } from "./use-browser-shell";

describe("useBrowserShell", () => {
  let fakes: ReturnType<typeof createFakeShellDeps>;
  const createDeps = () => fakes.deps;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    fakes = createFakeShellDeps();
  });

  afterEach(() => cleanup());

  it("moves from starting to loaded once the panel is requested", async () => {
    const { result } = renderHook(() =>
      useBrowserShell(DEFAULT_SHELL_CONFIG, createDeps)
    );

    expect(result.current.phase).toBe("starting");
    await waitFor(() => expect(result.current.phase).toBe("loaded"));
    expect(fakes.surface.history).toEqual([DEFAULT_SHELL_CONFIG.remoteUrl]);
  });

  it("mirrors the pending upload slot", async () => {
    const { result } = renderHook(() =>
      useBrowserShell(DEFAULT_SHELL_CONFIG, createDeps)
    );
    await waitFor(() => expect(result.current.phase).toBe("loaded"));

    await act(async () => {
      await fakes.surface.requestFileChooser().shown;
    });
    expect(result.current.awaitingUpload).toBe(true);

    act(() => {
      fakes.launcher.deliver({ requestCode: 100, resultCode: "canceled" });
    });
    expect(result.current.awaitingUpload).toBe(false);
  });

  it("reports a failed startup", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(fakes.surface, "configure").mockRejectedValue(
      new Error("WebView missing")
    );

    const { result } = renderHook(() =>
      useBrowserShell(DEFAULT_SHELL_CONFIG, createDeps)
    );

    await waitFor(() => expect(result.current.phase).toBe("failed"));
    expect(error).toHaveBeenCalledWith(
      "[BrowserShell] Startup failed:",
      new Error("WebView missing")
    );
  });

  it("disposes the shell on unmount", async () => {
    const { result, unmount } = renderHook(() =>
      useBrowserShell(DEFAULT_SHELL_CONFIG, createDeps)
    );
    await waitFor(() => expect(result.current.phase).toBe("loaded"));

    unmount();
    await flushPromises();

    expect(fakes.surface.destroyed).toBe(true);
    expect(fakes.platform.unsubscribe).toHaveBeenCalledTimes(1);
  });
});
