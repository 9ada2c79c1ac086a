import * as core from "@actions/core";
import pg from "pg";
import type { Pool } from "pg";
import { isCommand, runCommand, COMMANDS } from "./commands.js";
import { loadConfig } from "./config.js";
import { ShortlistError } from "./errors.js";
import { PostgresStore, ensureSchema } from "./store/postgres.js";

async function run(): Promise<void> {
  let pool: Pool | undefined;

  try {
    const command = core.getInput("command", { required: true });
    if (!isCommand(command)) {
      throw new Error(`Unknown command "${command}". Must be one of: ${COMMANDS.join(", ")}`);
    }

    const configPath = core.getInput("config_path");
    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    pool = new pg.Pool({
      connectionString: core.getInput("database_url", { required: true }),
    });
    await ensureSchema(pool);
    const store = new PostgresStore(pool);

    core.info(`Running ${command}`);
    const outputs = await runCommand(command, {
      store,
      config,
      inputs: {
        candidateId: core.getInput("candidate_id"),
        status: core.getInput("status"),
        reason: core.getInput("reason"),
        days: core.getInput("days"),
      },
    });

    for (const [name, value] of Object.entries(outputs)) {
      core.setOutput(name, value);
    }
  } catch (error) {
    if (error instanceof ShortlistError) {
      core.setFailed(`[${error.code}] ${error.message}`);
    } else if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  } finally {
    await pool?.end();
  }
}

void run();
