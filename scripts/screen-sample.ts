import { readFile } from "node:fs/promises";
import path from "node:path";
import { HashingEmbedder } from "../src/ai/hashing.embedder";
import { createLogger } from "../src/config/logger";
import { parseScreeningBody } from "../src/http/screening.requests";
import { MemoryVectorBackend } from "../src/matching/index/memory.backend";
import { TextSimilarityIndex } from "../src/matching/index/text-similarity.index";
import { buildFallbackExplanation } from "../src/matching/match-explanation.service";
import { MatchScorer } from "../src/matching/scoring/match-scorer";
import { CohortAuditor } from "../src/qa/cohort-auditor";

async function run(): Promise<void> {
  const samplePath = path.resolve(process.cwd(), process.argv[2] ?? "data/samples/screening.sample.json");
  const parsed = parseScreeningBody(JSON.parse(await readFile(samplePath, "utf-8")));
  if (!parsed.ok) {
    throw new Error(`Invalid sample file ${samplePath}: ${parsed.error}`);
  }

  const logger = createLogger({ minLevel: "warn" });
  const similarityIndex = new TextSimilarityIndex(new HashingEmbedder(), new MemoryVectorBackend(), logger);
  const scorer = new MatchScorer({ similarityIndex, logger });
  const auditor = new CohortAuditor({ logger });

  const { jobText, candidates, overrides } = parsed.value;
  const ranked = await scorer.batchScore(candidates, jobText, overrides);
  for (const [index, item] of ranked.entries()) {
    const explanation = buildFallbackExplanation(item.candidate, item.breakdown);
    console.log(
      `#${index + 1} ${item.candidate.name ?? "Unknown"}: ${item.breakdown.finalScore.toFixed(3)} (${explanation.recommendation})`,
    );
    console.log(`   matched: ${item.breakdown.matchedSkills.join(", ") || "none"}`);
    console.log(`   missing: ${item.breakdown.missingSkills.join(", ") || "none"}`);
  }

  const report = auditor.generateReport(
    ranked.map((item) => item.candidate),
    ranked.map((item) => item.breakdown),
  );
  console.log(report.summary);
  for (const flag of report.flags) {
    console.log(`[${flag.severity}] ${flag.message}`);
  }
}

run().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : "Unknown error");
  process.exitCode = 1;
});
