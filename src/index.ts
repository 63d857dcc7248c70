import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerListCatalog } from "./app/ListCatalog";
import { registerOrganize } from "./app/Organize";

const logger = createDefaultLoggerFromEnv();
const cli = cac("photo-date-sorter");

registerOrganize(cli, logger);
registerListCatalog(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
} else {
  try {
    await cli.runMatchedCommand();
  } catch (error) {
    logger.error({ error }, "執行命令時發生錯誤");
    process.exitCode = 1;
  }
}

// 等待檔案日誌寫完再結束
await dispose(logger);
