import { mkdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { CalendarDate } from "@/types";
import { folderNameOf } from "@/utils/calendarDate";
import { errnoOf, exists } from "@/utils/helper";

import type {
  DestinationPathPlanner,
  PlanError,
} from "./DestinationPathPlanner";

export class DestinationPathPlannerDefault implements DestinationPathPlanner {
  async plan(
    destinationRoot: string,
    date: CalendarDate,
    originalFileName: string
  ): Promise<Result<string, PlanError>> {
    const folder = path.join(destinationRoot, folderNameOf(date));
    try {
      await mkdir(folder, { recursive: true });
    } catch (e) {
      return err({ type: "CREATE_FOLDER_FAILED", folder, ...errnoOf(e) });
    }

    const ext = path.extname(originalFileName);
    const stem = path.basename(originalFileName, ext);
    let candidate = path.join(folder, originalFileName);
    for (let n = 1; await exists(candidate); n++) {
      candidate = path.join(folder, `${stem} (${n})${ext}`);
    }
    return ok(candidate);
  }
}
