import { JsonFileStore, type StoredRecord } from '@breachfeed/store';

const TOP_SOURCES = 10;

function printRow(label: string, value: string | number | null | undefined): void {
  console.log(`${label}: ${value ?? '-'}`);
}

function countBy(records: StoredRecord[], key: (record: StoredRecord) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const value = key(record);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

async function main(): Promise<void> {
  const path = process.argv[2] ?? process.env.DATA_FILE ?? 'data.json';
  const store = new JsonFileStore({
    path,
    logger: {
      info: (message) => console.log(message),
      warn: (message) => console.warn(message),
      error: (message) => console.error(message),
    },
  });

  const records = await store.load();
  const times = records.map((record) => new Date(record.timestamp).getTime()).filter(Number.isFinite);

  console.log(`=== ${path} ===`);
  printRow('total', records.length);
  printRow('newest', times.length > 0 ? new Date(Math.max(...times)).toISOString() : null);
  printRow('oldest', times.length > 0 ? new Date(Math.min(...times)).toISOString() : null);
  printRow('missing hash_id', records.filter((record) => !record.hash_id).length);

  console.log('=== by type ===');
  for (const [type, count] of countBy(records, (record) => record.Type ?? '-')) {
    printRow(type, count);
  }

  console.log(`=== top ${TOP_SOURCES} sources ===`);
  for (const [source, count] of countBy(records, (record) => record.Source ?? '-').slice(0, TOP_SOURCES)) {
    printRow(source, count);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
