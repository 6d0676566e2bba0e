import { loadAnalysisConfig } from "../core/config-loader.js";
import { ChangeHistoryStore } from "../history/store.js";

export async function historyListCommand(opts: { config?: string }): Promise<void> {
  const { config } = loadAnalysisConfig({ explicitPath: opts.config });
  const store = new ChangeHistoryStore(config.homeDir);
  const entries = await store.list();

  if (entries.length === 0) {
    console.log(`No stored changes under ${store.getChangesDir()}.`);
    return;
  }

  for (const entry of entries) {
    const risk =
      entry.riskScore === null ? "n/a" : `${entry.riskScore.toFixed(2)} (${entry.riskLevel ?? "?"})`;
    console.log(
      `${entry.changeId}  generated=${entry.generatedAt}  objects=${entry.objectCount}  risk=${risk}`,
    );
  }
}
