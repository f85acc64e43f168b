import { describe, it, expect } from 'vitest';
import {
  escapeCsvField,
  exportAllData,
  exportListsAsPlainText,
  exportToCsv,
  exportToJson,
  formatListAsPlainText,
} from '../list-exporter';
import { InMemoryEntityStore } from '../../import/in-memory-entity-store';
import { decodeExportData } from '../../import/schema-codec';
import { parsePlainText } from '../../import/text-parser';
import { T1, makeImage, makeItem, makeList, testId } from '../../import/__tests__/fixtures';

function seededStore(): InMemoryEntityStore {
  return new InMemoryEntityStore([
    makeList({
      items: [
        makeItem({ id: testId(101), title: 'Bread', quantity: 2, isCrossedOut: true, orderNumber: 1 }),
        makeItem({ images: [makeImage()] }),
      ],
    }),
    makeList({ id: testId(2), name: 'Old', orderNumber: 1, isArchived: true }),
  ]);
}

describe('exportAllData', () => {
  it('exports every list in display order', async () => {
    const data = await exportAllData(seededStore(), { now: T1 });

    expect(data.version).toBe('1.0');
    expect(data.exportDate).toEqual(T1);
    expect(data.lists.map((l) => l.name)).toEqual(['Groceries', 'Old']);
    expect(data.lists[0]!.items.map((i) => i.title)).toEqual(['Milk', 'Bread']);
  });

  it('leaves archived lists out on request', async () => {
    const data = await exportAllData(seededStore(), { includeArchived: false });
    expect(data.lists.map((l) => l.name)).toEqual(['Groceries']);
  });
});

describe('exportToJson', () => {
  it('produces a payload the importer decodes back to the same lists', async () => {
    const store = seededStore();
    const json = await exportToJson(store, { now: T1, pretty: true });

    const decoded = decodeExportData(json);
    expect(decoded.lists).toEqual(await store.findAllLists());
  });
});

describe('formatListAsPlainText', () => {
  const list = makeList({
    items: [
      makeItem({ id: testId(101), title: 'Bread', quantity: 2, isCrossedOut: true, orderNumber: 1 }),
      makeItem({ title: 'Milk' }),
    ],
  });

  it('writes one checkbox line per item in order', () => {
    expect(formatListAsPlainText(list)).toBe('[ ] Milk\n[✓] Bread (×2)');
  });

  it('can leave out crossed-out items and quantities', () => {
    expect(formatListAsPlainText(list, { includeCrossedOutItems: false })).toBe('[ ] Milk');
    expect(formatListAsPlainText(list, { includeQuantities: false })).toBe('[ ] Milk\n[✓] Bread');
  });

  it('is read back by the text parser', () => {
    expect(parsePlainText(formatListAsPlainText(list))).toEqual([
      { title: 'Milk', isCrossedOut: false, quantity: 1 },
      { title: 'Bread', isCrossedOut: true, quantity: 2 },
    ]);
  });
});

describe('exportListsAsPlainText', () => {
  it('writes one file per list named after the list', async () => {
    const files = await exportListsAsPlainText(seededStore());

    expect(files).toEqual([
      { fileName: '01-groceries.txt', content: '[ ] Milk\n[✓] Bread (×2)' },
      { fileName: '02-old.txt', content: '' },
    ]);
  });

  it('keeps the list name out of the body so re-importing adds only the items', async () => {
    const [file] = await exportListsAsPlainText(seededStore(), { includeArchived: false });

    expect(parsePlainText(file!.content).map((p) => p.title)).toEqual(['Milk', 'Bread']);
  });

  it('falls back to a generic file name when the list name has no usable characters', async () => {
    const store = new InMemoryEntityStore([makeList({ name: 'Épicerie ✓' }), makeList({ id: testId(2), name: '☆☆' })]);

    const files = await exportListsAsPlainText(store);

    expect(files.map((f) => f.fileName)).toEqual(['01-picerie.txt', '02-list.txt']);
  });
});

describe('escapeCsvField', () => {
  it('leaves plain fields as they are', () => {
    expect(escapeCsvField('Milk')).toBe('Milk');
  });

  it('quotes fields with commas, quotes or line breaks', () => {
    expect(escapeCsvField('Milk, whole')).toBe('"Milk, whole"');
    expect(escapeCsvField('12" pizza')).toBe('"12"" pizza"');
    expect(escapeCsvField('line one\nline two')).toBe('"line one\nline two"');
  });
});

describe('exportToCsv', () => {
  it('writes a header and one row per item', async () => {
    const csv = await exportToCsv(seededStore());

    expect(csv).toBe(
      'List Name,Item Title,Description,Quantity,Crossed Out,Created Date\n' +
        'Groceries,Milk,,1,No,2025-01-01T10:00:00.000Z\n' +
        'Groceries,Bread,,2,Yes,2025-01-01T10:00:00.000Z\n',
    );
  });

  it('quotes titles and descriptions that need it', async () => {
    const store = new InMemoryEntityStore([
      makeList({
        name: 'Party, Saturday',
        items: [makeItem({ title: '12" pizza', description: 'cheese,\nno olives' })],
      }),
    ]);

    const csv = await exportToCsv(store);

    expect(csv.split('\n').slice(1).join('\n')).toBe(
      '"Party, Saturday","12"" pizza","cheese,\nno olives",1,No,2025-01-01T10:00:00.000Z\n',
    );
  });

  it('writes only the header for an empty store', async () => {
    expect(await exportToCsv(new InMemoryEntityStore())).toBe(
      'List Name,Item Title,Description,Quantity,Crossed Out,Created Date\n',
    );
  });
});
