// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import ShellStatus from ".";

const PANEL_URL = "https://panel.example.com/";

describe("ShellStatus", () => {
  afterEach(() => cleanup());

  it("shows a loading message while starting", () => {
    render(
      <ShellStatus phase="starting" awaitingUpload={false} remoteUrl={PANEL_URL} />
    );

    expect(screen.getByRole("status").textContent).toBe("Loading panel…");
  });

  it("prompts for an image while the picker is open", () => {
    render(<ShellStatus phase="loaded" awaitingUpload remoteUrl={PANEL_URL} />);

    expect(screen.getByRole("status").textContent).toBe(
      "Choose an image to upload"
    );
  });

  it("names the address that failed to open", () => {
    render(
      <ShellStatus phase="failed" awaitingUpload={false} remoteUrl={PANEL_URL} />
    );

    expect(screen.getByRole("status").textContent).toBe(
      "Could not open https://panel.example.com/"
    );
  });

  it("renders nothing inside the status once loaded", () => {
    render(
      <ShellStatus phase="loaded" awaitingUpload={false} remoteUrl={PANEL_URL} />
    );

    expect(screen.getByRole("status").textContent).toBe("");
  });
});
