import fs from "fs";
import path from "path";
import { Student } from "../domain/student";
import { parseRecord } from "../loaders/recordLoader";
import { serializeRecord } from "./recordSnapshot";

/**
 * RecordStore handles saving and loading the student record.
 *
 * One JSON file holds the whole record. Writes go to a temporary sibling file
 * that is renamed over the store once fully written, so a failed or
 * interrupted save never leaves a truncated record behind.
 */
export class RecordStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Load the record. Returns null when there is no stored record yet;
   * throws MalformedStoreError when the file exists but is invalid.
   */
  load(): Student | null {
    if (!this.exists()) {
      return null;
    }
    const data = fs.readFileSync(this.filePath, "utf-8");
    return parseRecord(data);
  }

  /**
   * Save the record, replacing any previous one
   */
  save(student: Student): void {
    const content = serializeRecord(student);
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, content, "utf-8");
      fs.renameSync(tempPath, this.filePath);
    } catch (err) {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
      throw err;
    }
  }

  /**
   * Delete the stored record (full dataset reset)
   */
  reset(): void {
    if (this.exists()) {
      fs.unlinkSync(this.filePath);
    }
  }
}
