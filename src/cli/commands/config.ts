import pc from "picocolors";
import { loadConfig } from "../../config";

export function validateConfig(configPath?: string): boolean {
  const result = loadConfig({ configPath });
  if (result.success && result.config) {
    console.log(pc.green(`Config check passed: ${result.path}`));
    if (!result.fileFound) {
      console.log(pc.dim("No config file found; built-in defaults were used."));
    }
    const { agent, network, backend, turns } = result.config;
    console.log(`  agent:   ${agent.id}${agent.role ? ` (${agent.role})` : ""}`);
    console.log(`  group:   ${network.multicastAddress}:${network.port}`);
    console.log(`  backend: ${backend.provider}/${backend.model}`);
    console.log(`  turns:   ${turns.mode}`);
    return true;
  }
  console.error(pc.red(`Config check failed: ${result.path}`));
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exitCode = 1;
  return false;
}
