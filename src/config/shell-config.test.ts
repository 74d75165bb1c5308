import { describe, expect, it } from "vitest";
import {
  DEFAULT_REMOTE_URL,
  DEFAULT_SHELL_CONFIG,
  parseRemoteUrl,
  resolveShellConfig,
} from "./shell-config";

describe("resolveShellConfig", () => {
  it("uses the defaults without an override", () => {
    const config = resolveShellConfig({});

    expect(config).toBe(DEFAULT_SHELL_CONFIG);
    expect(config.remoteUrl).toBe(DEFAULT_REMOTE_URL);
    expect(config.permissions).toEqual([
      "readExternalStorage",
      "writeExternalStorage",
      "camera",
    ]);
    expect(config.fileChooser).toEqual({ mimeType: "image/*", requestCode: 100 });
    expect(Object.values(config.surfaceSettings).every(Boolean)).toBe(true);
  });

  it("ignores a blank override", () => {
    expect(resolveShellConfig({ VITE_REMOTE_URL: "  " }).remoteUrl).toBe(
      DEFAULT_REMOTE_URL
    );
  });

  it("replaces only the remote address", () => {
    const config = resolveShellConfig({
      VITE_REMOTE_URL: " https://panel.example.com/app ",
    });

    expect(config.remoteUrl).toBe("https://panel.example.com/app");
    expect(config.permissions).toBe(DEFAULT_SHELL_CONFIG.permissions);
    expect(config.surfaceSettings).toBe(DEFAULT_SHELL_CONFIG.surfaceSettings);
  });

  it("rejects addresses that are not https", () => {
    expect(() =>
      resolveShellConfig({ VITE_REMOTE_URL: "http://panel.example.com" })
    ).toThrow("Remote URL must use https: http://panel.example.com");
  });
});

describe("parseRemoteUrl", () => {
  it("normalises the address", () => {
    expect(parseRemoteUrl("https://Panel.Example.com")).toBe(
      "https://panel.example.com/"
    );
  });

  it("rejects values that are not URLs", () => {
    expect(() => parseRemoteUrl("panel.example.com")).toThrow(
      "Invalid remote URL: panel.example.com"
    );
  });
});
