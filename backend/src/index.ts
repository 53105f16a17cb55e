import dotenv from "dotenv";
dotenv.config();
import { loadConfig } from "./config";
import { createApp } from "./app";
import { CsvRecordStore } from "./database/record_store";
import { initStore } from "./database/init_store";
import { RatingEngine } from "./utils/rating_engine";

async function main() {
  const config = loadConfig();

  const store = new CsvRecordStore(config.eloCsvPath);
  await initStore(store);

  const app = createApp({ engine: new RatingEngine(store), mediaDir: config.mediaDir });
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`Serving media from ${config.mediaDir}`);
  });
}

main().catch((err) => {
  console.error("❌ Failed to start server:", err);
  process.exit(1);
});
