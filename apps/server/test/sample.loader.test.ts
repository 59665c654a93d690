import test from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { MemoryRecordStore } from "../src/services/memoryRecordStore.js";
import { loadSampleData, parseSampleFile, readSampleFile } from "../src/services/sampleDataLoader.js";

const samplePath = fileURLToPath(new URL("../data/sample_orders.json", import.meta.url));
const logger = pino({ level: "silent" });

test("sample order batch reconciles to three missing shipments", async () => {
  const store = new MemoryRecordStore();
  const sample = await readSampleFile(samplePath);

  const summary = await loadSampleData(store, sample, logger);

  assert.equal(summary.batchName, "sample_order_shipments");
  assert.equal(summary.totalExpected, 10);
  assert.equal(summary.totalProcessed, 7);
  assert.deepEqual(summary.missingRecords, [10004, 10006, 10009]);
  assert.deepEqual(summary.unexpectedRecords, []);
  assert.equal(summary.processingRate, 70);
});

test("loading the sample twice replaces the earlier data", async () => {
  const store = new MemoryRecordStore();
  const sample = await readSampleFile(samplePath);

  await loadSampleData(store, sample, logger);
  const second = await loadSampleData(store, sample, logger);

  const batches = await store.listBatches();
  assert.equal(batches.length, 1);
  assert.equal(batches[0].id, second.batchId);
  assert.equal(await store.countRecords(second.batchId), 17);
});

test("sample records listed under the wrong status are rejected", () => {
  const batch = { batchName: "mislabeled", recordType: "order" };
  assert.throws(() =>
    parseSampleFile({
      batch,
      expectedRecords: [{ recordId: 1, status: "processed" }],
      processedRecords: []
    })
  );
  assert.throws(() =>
    parseSampleFile({
      batch,
      expectedRecords: [],
      processedRecords: [{ recordId: 1, status: "expected" }]
    })
  );
});
