import test from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { BatchService } from "../src/services/batchService.js";
import { BatchNotFoundError, DuplicateBatchNameError } from "../src/services/errors.js";
import { MemoryRecordStore } from "../src/services/memoryRecordStore.js";
import { RecordService } from "../src/services/recordService.js";

const logger = pino({ level: "silent" });

function services() {
  const store = new MemoryRecordStore();
  return {
    store,
    batches: new BatchService(store, logger),
    records: new RecordService(store, logger)
  };
}

test("createBatch assigns ascending ids and defaults description to null", async () => {
  const { batches } = services();
  const first = await batches.createBatch({ batchName: "a", recordType: "order" });
  const second = await batches.createBatch({ batchName: "b", recordType: "payment", description: "card settlements" });

  assert.equal(first.id, 1);
  assert.equal(first.description, null);
  assert.equal(second.id, 2);
  assert.equal(second.description, "card settlements");
  assert.deepEqual((await batches.listBatches()).map((batch) => batch.batchName), ["a", "b"]);
});

test("createBatch rejects a duplicate batch name", async () => {
  const { batches } = services();
  await batches.createBatch({ batchName: "nightly", recordType: "file" });
  await assert.rejects(batches.createBatch({ batchName: "nightly", recordType: "order" }), DuplicateBatchNameError);
});

test("deleteBatch cascades to the batch's records", async () => {
  const { store, batches, records } = services();
  const batch = await batches.createBatch({ batchName: "doomed", recordType: "shipment" });
  await records.bulkCreateRecords(batch.id, [
    { recordId: 1, status: "expected" },
    { recordId: 1, status: "processed" }
  ]);

  await batches.deleteBatch(batch.id);

  await assert.rejects(batches.getBatch(batch.id), BatchNotFoundError);
  assert.equal(await store.countRecords(batch.id), 0);
  await assert.rejects(batches.deleteBatch(batch.id), BatchNotFoundError);
});

test("record operations require an existing batch", async () => {
  const { records } = services();
  await assert.rejects(records.createRecord(3, { recordId: 1, status: "expected" }), BatchNotFoundError);
  await assert.rejects(records.bulkCreateRecords(3, [{ recordId: 1, status: "expected" }]), BatchNotFoundError);
  await assert.rejects(records.listRecords(3), BatchNotFoundError);
  await assert.rejects(records.clearRecords(3), BatchNotFoundError);
});

test("listRecords filters by status and clearRecords purges only that batch", async () => {
  const { batches, records } = services();
  const kept = await batches.createBatch({ batchName: "kept", recordType: "transaction" });
  const purged = await batches.createBatch({ batchName: "purged", recordType: "transaction" });
  await records.bulkCreateRecords(kept.id, [{ recordId: 10, status: "expected" }]);
  await records.bulkCreateRecords(purged.id, [
    { recordId: 20, status: "expected", recordMetadata: "tx 20" },
    { recordId: 20, status: "processed" },
    { recordId: 21, status: "expected" }
  ]);

  const expected = await records.listRecords(purged.id, "expected");
  assert.deepEqual(expected.map((record) => record.recordId), [20, 21]);
  assert.equal(expected[0].recordMetadata, "tx 20");
  assert.equal(expected[1].recordMetadata, null);

  assert.equal(await records.clearRecords(purged.id), 3);
  assert.deepEqual(await records.listRecords(purged.id), []);
  assert.equal((await records.listRecords(kept.id)).length, 1);
  assert.equal((await batches.getBatch(purged.id)).batchName, "purged");
});
