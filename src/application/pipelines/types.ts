/** Where a pipeline reads from and writes to; resolved by WarehouseService. */
export interface PipelinePaths {
  inputDir: string;
  pattern: string;
  outputDir: string;
}
