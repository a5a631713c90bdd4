import {
  CorruptRecordError,
  MavLogStreamReader,
  MavLogTypes,
  TlogStreamReader,
} from "@mavlog/core";
import { InvalidArgumentError, program } from "commander";
import { createReadStream } from "fs";
import { isEqual } from "lodash";
import { performance } from "perf_hooks";
import { stringify as uuidStringify } from "uuid";

type TypedLogEntry = MavLogTypes.TypedLogEntry;

/** The part of the stream reader protocol shared by both file formats. */
type EntryReader = {
  append(data: Uint8Array): void;
  end(): void;
  nextEntry(): TypedLogEntry | undefined;
  done(): boolean;
};

type DumpOptions = {
  tlog: boolean;
  strict: boolean;
  dump: boolean;
  mavlinkVersion: MavLogTypes.MavlinkVersion;
};

function log(...data: unknown[]) {
  console.log(...data);
}

function formatBytes(totalBytes: number) {
  const units = ["Bytes", "kiB", "MiB", "GiB", "TiB"];
  let bytes = totalBytes;
  let unit = 0;
  while (unit + 1 < units.length && bytes >= 1024) {
    bytes /= 1024;
    unit++;
  }
  return `${bytes.toFixed(2)}${units[unit]!}`;
}

function formatTimestamp(timestamp: bigint | undefined) {
  return timestamp == undefined ? "-".padStart(16, " ") : timestamp.toString().padStart(16, " ");
}

function formatEntry(entry: TypedLogEntry) {
  const ts = formatTimestamp(entry.timestamp);
  switch (entry.type) {
    case "Raw":
      return `${ts} Raw ${Array.from(entry.raw)
        .map((val) => val.toString(16).padStart(2, "0"))
        .join(" ")}`;
    case "Text":
      return `${ts} Text ${JSON.stringify(entry.text)}`;
    case "Mavlink": {
      const { header, message } = entry;
      return (
        `${ts} Mavlink msg ${message.messageId} from ${header.systemId}/${header.componentId}` +
        ` seq ${header.sequence} (${message.payload.byteLength} bytes` +
        (header.signature ? ", signed)" : ")")
      );
    }
  }
}

function parseMavlinkVersion(value: string): MavLogTypes.MavlinkVersion {
  if (value === "1") {
    return 1;
  }
  if (value === "2") {
    return 2;
  }
  throw new InvalidArgumentError("Expected 1 or 2.");
}

/**
 * Read entries until more input is needed. Text records that are not valid UTF-8 are reported
 * and skipped unless `strict` is set.
 */
function drain(
  reader: EntryReader,
  processEntry: (entry: TypedLogEntry) => void,
  onCorrupt: (error: CorruptRecordError) => void,
  strict: boolean,
) {
  for (;;) {
    let entry: TypedLogEntry | undefined;
    try {
      entry = reader.nextEntry();
    } catch (error) {
      if (strict || !(error instanceof CorruptRecordError)) {
        throw error;
      }
      onCorrupt(error);
      continue;
    }
    if (!entry) {
      return;
    }
    processEntry(entry);
  }
}

async function readStream(
  filePath: string,
  reader: EntryReader,
  drainReader: () => void,
) {
  const startTime = performance.now();
  let readBytes = 0n;

  await new Promise<void>((resolve, reject) => {
    const stream = createReadStream(filePath);
    stream.on("data", (data) => {
      try {
        if (typeof data === "string") {
          throw new Error("expected buffer");
        }
        readBytes += BigInt(data.byteLength);
        reader.append(data);
        drainReader();
      } catch (error) {
        reject(error);
        stream.close();
      }
    });
    stream.on("error", (error) => reject(error));
    stream.on("close", () => resolve());
  });

  // throws if the file stops part way through a record
  reader.end();
  drainReader();

  const durationMs = performance.now() - startTime;
  log(
    `Read ${formatBytes(Number(readBytes))} in ${durationMs.toFixed(2)}ms (${formatBytes(
      Number(readBytes) / (durationMs / 1000),
    )}/sec)`,
  );
}

function logHeader(reader: MavLogStreamReader) {
  const { header } = reader;
  if (!header) {
    return;
  }
  const { messageDefinition: definition } = header;
  const created = new Date(Number(header.timestampUs / 1000n)).toISOString();
  log(`File ${uuidStringify(header.uuid)} created ${created} by "${header.srcApplicationId}"`);
  log(
    `MAVLink ${definition.versionMajor}.${definition.versionMinor} (${definition.dialect}),` +
      ` ${reader.layout ?? "unknown"} records`,
  );
}

async function dumpFile(
  filePath: string,
  { tlog, strict, dump, mavlinkVersion }: DumpOptions,
): Promise<MavLogTypes.FileHeader | undefined> {
  const entryCounts = new Map<TypedLogEntry["type"] | "Corrupt", number>();

  function processEntry(entry: TypedLogEntry) {
    entryCounts.set(entry.type, (entryCounts.get(entry.type) ?? 0) + 1);
    if (dump) {
      log(formatEntry(entry));
    }
  }

  function onCorrupt(error: CorruptRecordError) {
    entryCounts.set("Corrupt", (entryCounts.get("Corrupt") ?? 0) + 1);
    log(`Skipped: ${error.message}`);
  }

  const resyncPolicy = strict ? "strict" : "lenient";
  log("Reading", filePath);

  let header: MavLogTypes.FileHeader | undefined;
  if (tlog || filePath.endsWith(".tlog")) {
    const reader = new TlogStreamReader({ mavlinkVersion, resyncPolicy });
    await readStream(filePath, reader, () => {
      drain(reader, processEntry, onCorrupt, strict);
    });
  } else {
    const reader = new MavLogStreamReader({ resyncPolicy });
    await readStream(filePath, reader, () => {
      drain(reader, processEntry, onCorrupt, strict);
    });
    logHeader(reader);
    header = reader.header;
  }

  log("Entry counts:");
  for (const [type, count] of entryCounts) {
    log(`  ${count.toFixed().padStart(6, " ")} ${type}`);
  }
  return header;
}

program
  .argument("<file...>", "path to .mav or .tlog file(s)")
  .option("--tlog", "read files as telemetry logs regardless of their extension", false)
  .option("--strict", "stop at the first corrupt record instead of skipping it", false)
  .option("--dump", "print every entry to stdout", false)
  .option(
    "--mavlink-version <n>",
    "MAVLink version of telemetry log frames",
    parseMavlinkVersion,
    2 as const,
  )
  .action(async (files: string[], options: DumpOptions) => {
    let previous: { file: string; header: MavLogTypes.FileHeader } | undefined;
    for (const file of files) {
      const header = await dumpFile(file, options).catch(console.error);
      if (!header) {
        continue;
      }
      if (previous && isEqual(previous.header, header)) {
        log(`Same header as ${previous.file}; the files are segments of one log`);
      }
      previous = { file, header };
    }
  })
  .parse();
