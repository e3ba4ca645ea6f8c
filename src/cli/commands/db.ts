import type { Command } from "commander";
import { getDbHandle, closeDb } from "../../db/client";
import { env } from "../../core/config";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Create or upgrade the database at DATABASE_PATH")
    .action(() => {
      const { migrations } = getDbHandle();
      console.log(`Database: ${env.DATABASE_PATH}`);
      console.log(`  applied: ${migrations.applied.length > 0 ? migrations.applied.join(", ") : "none"}`);
      console.log(`  already up to date: ${migrations.skipped.length}`);
      closeDb();
    });
};
