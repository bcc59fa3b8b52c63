import type { ConversionHandler } from "../lib/converter";
import type { ConcurrencyGate } from "../lib/gate";
import type { WorkspaceManager } from "../lib/workspace";
import type { Transcoder } from "../types";

export interface AppContext {
  handler: ConversionHandler;
  transcoder: Transcoder;
  workspaces: WorkspaceManager;
  gate: ConcurrencyGate;
}
