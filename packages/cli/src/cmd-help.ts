/**
 * pile help - progressive-discovery help system
 */
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { listStdUnits } from "@pile/std";

export { QUICKREF };

function resolveTopic(topic: string): string | null {
  const normalized = topic.toLowerCase().trim();

  // Guard against prototype-chain keys like "constructor" or "__proto__".
  if (Object.prototype.hasOwnProperty.call(TOPICS, normalized)) {
    return normalized;
  }

  // Prefix matching: "bu" -> "builtins", "imp" -> "imports"
  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  if (matches.length === 1) {
    return matches[0];
  }

  return null;
}

function renderStdlibIndex(): string {
  const units = listStdUnits();
  const procs = units.flatMap((unit) => unit.procs);
  const numWidth = String(procs.length).length;
  const nameWidth = Math.max(...procs.map((p) => p.name.length));

  const lines = ["PILE STDLIB INDEX", "=================", ""];
  let idx = 0;
  for (const unit of units) {
    lines.push(`import "${unit.name}"`);
    for (const proc of unit.procs) {
      idx++;
      const num = String(idx).padStart(numWidth, " ");
      lines.push(`  ${num}. ${proc.name.padEnd(nameWidth, " ")}  ${proc.doc}`.trimEnd());
    }
    lines.push("");
  }
  lines.push(`Total: ${procs.length}`, "", "More details:", "  pile help stdlib");
  return lines.join("\n");
}

function renderUsage(commands: string[]): string {
  return ["Usage:", ...commands.map((command) => `  ${command}`)].join("\n");
}

function renderTopicList(): string {
  return ["Available topics:", ...TOPIC_LIST.map((name) => `  - ${name}`)].join("\n");
}

export function runHelp(topic?: string, opts: { index?: boolean } = {}): void {
  if (opts.index) {
    if (!topic || resolveTopic(topic) !== "stdlib") {
      console.error("The --index flag is only supported with the stdlib topic.");
      console.error(renderUsage(["pile help stdlib --index"]));
      process.exitCode = 1;
      return;
    }

    console.log(renderStdlibIndex());
    return;
  }

  if (!topic) {
    console.log(QUICKREF);
    return;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(renderTopicList());
  console.error(renderUsage(["pile help <topic>", "pile help stdlib --index"]));
  process.exitCode = 1;
}
