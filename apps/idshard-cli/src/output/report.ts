import { writeFile } from "node:fs/promises";
import { stringifyYAML } from "confbox";
import type { PartitionResult } from "@idshard/engine";
import { encodeShards } from "../config/shard-names.js";
import type { OutputFormat } from "../config/schema.js";

export interface ShardReportMetadata {
  generated_at: string;
  source_type: string;
  group_id?: string;
  strategy: string;
  seed: string;
  total_ids_fetched: number;
  excluded_id_count: number;
  reserved_id_count: number;
  unreserved_ids_distributed: number;
  shard_count: number;
}

export interface ShardReport {
  metadata: ShardReportMetadata;
  shards: Record<string, string[]>;
}

export interface ShardReportContext {
  generatedAt: Date;
  sourceType: string;
  /** Omitted from the report when empty. */
  groupId: string;
  strategy: string;
  seed: string;
}

export function buildShardReport(
  result: PartitionResult,
  context: ShardReportContext,
): ShardReport {
  const { metadata } = result;

  return {
    metadata: {
      generated_at: context.generatedAt.toISOString(),
      source_type: context.sourceType,
      ...(context.groupId ? { group_id: context.groupId } : {}),
      strategy: context.strategy,
      seed: context.seed,
      total_ids_fetched: metadata.totalFetched,
      excluded_id_count: metadata.excludedCount,
      reserved_id_count: metadata.reservedCount,
      unreserved_ids_distributed: metadata.distributedCount,
      shard_count: metadata.shardCount,
    },
    shards: encodeShards(result.shards),
  };
}

export function serializeShardReport(report: ShardReport, format: OutputFormat): string {
  switch (format) {
    case "yaml":
      return stringifyYAML(report);
    case "json":
      return `${JSON.stringify(report, null, 2)}\n`;
  }
}

export type ReportDestination = {
  format: OutputFormat;
  /** Empty: write to `stdout`. */
  outputFile: string;
  stdout: (text: string) => void;
  stderr: (...data: unknown[]) => void;
};

/**
 * Serialises the report and writes it in one piece, to a file or to stdout.
 */
export async function writeShardReport(
  report: ShardReport,
  destination: ReportDestination,
): Promise<void> {
  const data = serializeShardReport(report, destination.format);

  if (destination.outputFile) {
    await writeFile(destination.outputFile, data, { mode: 0o644 });
    destination.stderr(`Output written to ${destination.outputFile}`);
    return;
  }

  destination.stdout(data);
}
