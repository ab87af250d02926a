import { Command } from "commander";
import type { Runtime } from "../runtime.js";

export interface AuthStatus {
  mode: string;
  tenantId: string;
  projectId: string;
  publicationBaseUrl: string;
  expiresInSeconds: number;
}

// Obtains (and, in cache mode, persists) a credential without touching topics
export async function runAuth(runtime: Runtime, now: () => number = Date.now): Promise<AuthStatus> {
  const credential = await runtime.auth.obtainCredential();
  return {
    mode: runtime.auth.mode,
    tenantId: runtime.auth.context.tenantId,
    projectId: runtime.auth.context.projectId,
    publicationBaseUrl: credential.publicationBaseUrl,
    expiresInSeconds: Math.max(0, Math.floor((credential.expiresAt - now()) / 1000)),
  };
}

export function createAuthCommand(getRuntime: () => Runtime): Command {
  return new Command("auth")
    .description("Authenticate and show the credential's remaining lifetime")
    .action(async () => {
      const status = await runAuth(getRuntime());
      console.log(`Mode:        ${status.mode}`);
      console.log(`Tenant:      ${status.tenantId}`);
      console.log(`Project:     ${status.projectId}`);
      console.log(`Publication: ${status.publicationBaseUrl}`);
      console.log(`Expires in:  ${Math.floor(status.expiresInSeconds / 60)} min`);
    });
}
