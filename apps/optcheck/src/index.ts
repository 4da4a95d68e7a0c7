// apps/optcheck/src/index.ts
import { HELP_TEXT, parseOptcheckArgs, resolveFromRoot, runOptcheck } from "./optcheck";
import { readOptionList } from "./optionList";

async function main(): Promise<void> {
  const projectRoot = process.env.INIT_CWD ?? process.cwd();
  const cfg = parseOptcheckArgs(process.argv.slice(2));

  if (cfg.help) {
    console.log(HELP_TEXT);
    return;
  }

  const list = cfg.listPath === null ? null : await readOptionList(resolveFromRoot(projectRoot, cfg.listPath));
  console.log(runOptcheck(cfg, list));
}

main().catch((err) => {
  if (err && typeof err === "object" && "exitCode" in err && typeof err.exitCode === "number") {
    const note = err instanceof Error ? err.message : String(err);
    console.error(`ERROR: ${note}`);
    process.exit(err.exitCode);
  }

  console.error(String(err instanceof Error ? err.stack : err));
  process.exit(1);
});
