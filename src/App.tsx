import ShellStatus from "./components/shell-status";
import { resolveShellConfig } from "./config/shell-config";
import { useBrowserShell } from "./hooks/use-browser-shell";

const config = resolveShellConfig();

const App = () => {
  const { phase, awaitingUpload } = useBrowserShell(config);

  return (
    <ShellStatus
      phase={phase}
      awaitingUpload={awaitingUpload}
      remoteUrl={config.remoteUrl}
    />
  );
};

export default App;
