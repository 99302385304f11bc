import { createAnalysisService } from "./server/analysis";
import { getConfig } from "./server/config";
import { errorMessage } from "./server/errors";
import { INFLUENCE_COMPONENTS } from "./server/influence";
import { getSentimentLabel } from "./server/sentiment";
import {
  MemoryAnalysisStore,
  MongoAnalysisStore,
  connectDatabase,
  disconnectDatabase,
  type AnalysisStore,
} from "./server/storage";
import type { PersonAnalysis } from "./server/types/analysis";

const args = process.argv.slice(2);
const refresh = args.includes("--refresh");
const handleIndex = args.indexOf("--handle");
const twitterHandle = handleIndex >= 0 ? args[handleIndex + 1] : undefined;
const name = args
  .filter(
    (arg, index) =>
      !arg.startsWith("--") && (handleIndex < 0 || index !== handleIndex + 1)
  )
  .join(" ")
  .trim();

if (!name || (handleIndex >= 0 && !twitterHandle)) {
  console.error('❌ Usage: npm run cli -- "<person name>" [--handle <twitter_handle>] [--refresh]');
  console.error("\nOptions:");
  console.error("  --handle   Twitter handle to use instead of twittermappings.json");
  console.error("  --refresh  Ignore cached analyses and fetch fresh data");
  process.exit(1);
}

function printSummary(analysis: PersonAnalysis, cached: boolean) {
  const { details, twitter, news, influence } = analysis;

  console.log(`\n===== Influence IQ: ${analysis.name}${cached ? " (cached)" : ""} =====`);
  if (analysis.imageUrl) {
    console.log(`🖼️  Image: ${analysis.imageUrl}`);
  }

  if (details) {
    console.log("\n👤 Details");
    console.log(`   Name: ${details.name}`);
    console.log(`   Date of Birth: ${details.dob}`);
    console.log(`   Age: ${details.age}`);
    console.log(`   Net Worth: ${details.netWorth}`);
    console.log(`   Charity: ${details.charity}`);
    console.log(
      `   Companies: ${details.companies.length > 0 ? details.companies.join(", ") : "none listed"}`
    );
  }

  if (twitter) {
    console.log(`\n🐦 Twitter @${twitter.username}${twitter.source === "synthetic" ? " (synthetic)" : ""}`);
    console.log(`   Category: ${twitter.category}`);
    console.log(`   Followers: ${twitter.followers.toLocaleString("en-US")}`);
    console.log(`   Years Active: ${twitter.yearsActive}`);
    console.log(`   Engagement Rate: ${(twitter.engagementRate * 100).toFixed(2)}%`);
    console.log(`   Content Quality: ${twitter.contentQuality}/10`);
    console.log(`   Sentiment Score: ${twitter.sentiment.toFixed(2)}`);
    console.log(`   Top Topics: ${twitter.topics.join(", ")}`);
    console.log(`   Posting Frequency: ${twitter.postingFrequency}`);
  }

  if (news) {
    console.log("\n📰 News");
    console.log(
      `   Sentiment Score: ${news.sentimentScore.toFixed(2)} (${getSentimentLabel(news.sentimentScore)})`
    );
    console.log(`   Credibility Score: ${news.credibilityScore.toFixed(2)}`);
    console.log(`   Overall News Nature: ${news.nature}`);
    console.log(`   Credibility: ${news.credibility}`);
    for (const article of news.articles) {
      console.log(`   - ${article.title} (${article.source}) ${article.publishedAt}`);
      console.log(`     ${article.url}`);
    }
  }

  console.log("\n🏆 Influence Rating");
  console.log(`   Overall Score: ${influence.score}/100`);
  console.log(`   Grade: ${influence.grade}`);
  for (const component of INFLUENCE_COMPONENTS) {
    const points = influence.components[component];
    const weight = influence.weights[component];
    console.log(
      `   ${component.padEnd(12)} ${points.toFixed(1)}/${weight} points (${((points / weight) * 100).toFixed(1)}%)`
    );
  }

  if (analysis.warnings.length > 0) {
    console.log("\n⚠️ Warnings");
    analysis.warnings.forEach((warning) => console.log(`   - ${warning}`));
  }
}

async function run() {
  const config = getConfig();

  let store: AnalysisStore = new MemoryAnalysisStore();
  if (config.mongoUri) {
    await connectDatabase(config.mongoUri);
    store = new MongoAnalysisStore();
  }

  try {
    const service = await createAnalysisService(config, store);
    const { analysis, cached } = await service.analyzePerson(name, {
      twitterHandle,
      refresh,
    });
    printSummary(analysis, cached);
  } finally {
    if (config.mongoUri) {
      await disconnectDatabase();
    }
  }
}

run()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error(`\n❌ Analysis failed: ${errorMessage(error)}`);
    process.exit(1);
  });
