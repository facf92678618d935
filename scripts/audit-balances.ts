import { writeFile } from "node:fs/promises";
import { buildApp } from "../src/server.js";
import { loadRuntimeConfig } from "../src/infra/config.js";
import { makeLogger } from "../src/infra/logger.js";
import type { BalanceAuditReport } from "../src/domain/types.js";

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const logger = makeLogger({ bindings: { script: "ledger:audit" } });
  const outputPath = process.env.CSL_AUDIT_REPORT_PATH?.trim();
  const app = buildApp({ ...config, rateLimitEnabled: false }, { logger });

  try {
    const response = await app.inject({
      method: "GET",
      url: "/v1/balances/audit",
      headers: { authorization: `Bearer ${config.apiKey}` },
    });
    if (response.statusCode !== 200) {
      throw new Error(`Balance audit failed with status ${response.statusCode}: ${response.body}`);
    }
    const report = response.json<BalanceAuditReport>();
    if (outputPath) {
      await writeFile(outputPath, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    }
    if (report.ok) {
      logger.info({ totals: report.totals }, "ledger:audit OK");
    } else {
      logger.error({ report }, "ledger:audit found mismatched balances");
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

await main();
