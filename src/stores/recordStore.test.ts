import fs from "fs";
import os from "os";
import path from "path";
import { MalformedStoreError } from "../domain/errors";
import { addSemester } from "../domain/programEditor";
import { buildStudent } from "../testing/fixtures";
import { serializeRecord } from "./recordSnapshot";
import { RecordStore } from "./recordStore";

describe("RecordStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "study-record-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("returns null when nothing has been saved", () => {
      const store = new RecordStore(path.join(dir, "record.json"));

      expect(store.exists()).toBe(false);
      expect(store.load()).toBeNull();
    });

    it("throws MalformedStoreError for a broken file", () => {
      const filePath = path.join(dir, "record.json");
      fs.writeFileSync(filePath, '{"id": "student-1"}');

      expect(() => new RecordStore(filePath).load()).toThrow(MalformedStoreError);
    });
  });

  describe("save", () => {
    it("writes the serialized record and reads it back", () => {
      const filePath = path.join(dir, "record.json");
      const store = new RecordStore(filePath);
      const student = buildStudent();
      addSemester(student.program, { number: 1 });

      store.save(student);

      expect(fs.readFileSync(filePath, "utf-8")).toBe(serializeRecord(student));
      expect(store.load()).toEqual(student);
    });

    it("leaves no temporary file behind", () => {
      const store = new RecordStore(path.join(dir, "record.json"));
      store.save(buildStudent());

      expect(fs.readdirSync(dir)).toEqual(["record.json"]);
    });

    it("creates missing directories", () => {
      const filePath = path.join(dir, "nested", "data", "record.json");
      new RecordStore(filePath).save(buildStudent());

      expect(fs.existsSync(filePath)).toBe(true);
    });

    it("replaces the previous record", () => {
      const store = new RecordStore(path.join(dir, "record.json"));
      const student = buildStudent();
      store.save(student);

      addSemester(student.program, { number: 1 });
      store.save(student);

      expect(store.load()?.program.semesters).toHaveLength(1);
    });

    it("removes the temporary file when the rename fails", () => {
      // A non-empty directory cannot be replaced by a file
      const target = path.join(dir, "occupied");
      fs.mkdirSync(target);
      fs.writeFileSync(path.join(target, "keep.txt"), "x");

      expect(() => new RecordStore(target).save(buildStudent())).toThrow();
      expect(fs.readdirSync(dir)).toEqual(["occupied"]);
    });
  });

  describe("reset", () => {
    it("deletes the stored record", () => {
      const store = new RecordStore(path.join(dir, "record.json"));
      store.save(buildStudent());

      store.reset();

      expect(store.exists()).toBe(false);
      expect(store.load()).toBeNull();
    });
  });
});
