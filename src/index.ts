import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerProcessMedia } from "./app/ProcessMedia";
import { registerResolveAlbums } from "./app/ResolveAlbums";
import { registerTransferMedia } from "./app/TransferMedia";

const logger = createDefaultLoggerFromEnv();
const cli = cac("sidecar-ingest");

registerProcessMedia(cli, logger);
registerResolveAlbums(cli, logger);
registerTransferMedia(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exit(1);
}
