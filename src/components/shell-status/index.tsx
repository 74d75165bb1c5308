import { CircleAlert, ImageUp, Loader2 } from "lucide-react";
import type { ShellPhase } from "@/lib/definitions";
import { cn } from "@/lib/utils";

interface ShellStatusProps {
  phase: ShellPhase;
  awaitingUpload: boolean;
  remoteUrl: string;
}

// Visible until the native surface covers the screen, and again if it fails
const ShellStatus = ({ phase, awaitingUpload, remoteUrl }: ShellStatusProps) => {
  const failed = phase === "failed";

  return (
    <div
      role="status"
      className={cn(
        "flex h-full flex-col items-center justify-center gap-3 px-6 text-center text-sm",
        failed ? "text-red-300" : "text-slate-300"
      )}
    >
      {failed ? (
        <>
          <CircleAlert className="size-8" />
          <span>Could not open {remoteUrl}</span>
        </>
      ) : awaitingUpload ? (
        <>
          <ImageUp className="size-8" />
          <span>Choose an image to upload</span>
        </>
      ) : phase === "starting" ? (
        <>
          <Loader2 className="size-8 animate-spin" />
          <span>Loading panel…</span>
        </>
      ) : null}
    </div>
  );
};

export default ShellStatus;
