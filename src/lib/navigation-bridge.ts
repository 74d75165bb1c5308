import type { BrowserSurface, NavigationClient } from "./definitions";

/**
 * Keeps every navigation inside the embedded surface instead of handing
 * links to an external browser.
 */
export class NavigationBridge implements NavigationClient {
  constructor(private readonly surface: BrowserSurface) {}

  onPageFinished(url: string): void {
    console.log(`[Navigation] Page finished: ${url}`);
  }

  async shouldOverrideUrlLoading(url: string): Promise<boolean> {
    await this.surface.loadUrl(url);
    return true;
  }
}
