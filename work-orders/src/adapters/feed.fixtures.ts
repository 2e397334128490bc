import * as fs from "fs";
import * as path from "path";
import { FeedTable } from "../core/dto";
import { errorMessage, FeedFetchError } from "../core/errors";
import { FeedSourcePort } from "../core/ports";
import { parseCsvTable } from "./csv";

/**
 * Development source: the feed URL names a CSV file in the fixtures directory.
 */
export class FixtureFeedSource implements FeedSourcePort {
  constructor(private dir: string = path.join(__dirname, "../../fixtures")) {}

  async fetchTable(url: string): Promise<FeedTable> {
    const file = path.join(this.dir, path.basename(url));
    try {
      const text = await fs.promises.readFile(file, "utf-8");
      return parseCsvTable(text);
    } catch (error) {
      throw new FeedFetchError(`Cannot read fixture: ${errorMessage(error)}`, url, undefined, {
        cause: error,
      });
    }
  }
}
