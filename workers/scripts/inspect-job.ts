import "dotenv/config";
import { Job } from "bullmq";
import { connection, labExtractQueue } from "../src/queues.js";
import type { LabExtractJobData } from "../src/types.js";
import type { ExtractionResult } from "../src/extraction/types.js";

/**
 * Prints the state of a lab-extract job: npx tsx workers/scripts/inspect-job.ts <jobId>
 */
async function main() {
  const jobId = process.argv[2];
  if (!jobId) {
    console.log("Usage: npx tsx workers/scripts/inspect-job.ts <jobId>");
    process.exit(1);
  }

  const job = await Job.fromId<LabExtractJobData, ExtractionResult>(
    labExtractQueue,
    jobId,
  );
  if (job) {
    console.log("Found job:", job.id, "State:", await job.getState());
    if (job.failedReason) console.log("Failed Reason:", job.failedReason);
    if (job.returnvalue) {
      const { qa, tests } = job.returnvalue;
      console.log("Status:", qa.status, "Tests:", tests.length);
    }
  } else {
    console.log("Job not found");
    const hgetRes = await connection.hget(
      `bull:${labExtractQueue.name}:${jobId}`,
      "failedReason",
    );
    console.log("hget Res:", hgetRes);
  }

  await labExtractQueue.close();
  await connection.quit();
}

main().catch((error: unknown) => {
  console.error("Inspection failed:", error);
  process.exit(1);
});
