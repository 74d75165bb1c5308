import type { CapacitorConfig } from "@capacitor/cli";

const config: CapacitorConfig = {
  appId: "com.screenshotpanel.shell",
  appName: "Screenshot Panel",
  webDir: "dist",
  server: {
    androidScheme: "https",
  },
};

export default config;
