export class BatchNotFoundError extends Error {
  readonly code = "batch_not_found";

  constructor(readonly batchId: number) {
    super(`Batch with id ${batchId} not found`);
    this.name = "BatchNotFoundError";
  }
}

export class DuplicateBatchNameError extends Error {
  readonly code = "batch_name_exists";

  constructor(readonly batchName: string) {
    super(`Batch with name '${batchName}' already exists`);
    this.name = "DuplicateBatchNameError";
  }
}
