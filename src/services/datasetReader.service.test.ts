import 'reflect-metadata';
import fs from 'fs';
import path from 'path';
import { DatasetReaderService, concatTables, parseCsv } from './datasetReader.service';
import { NoDataError } from '../errors/dataset.errors';
import { createTestServices, TestServices } from '../test/testServices';

describe('DatasetReaderService', () => {
    let services: TestServices;
    let reader: DatasetReaderService;

    const writeDataFile = (relativePath: string, content: string): void => {
        const target = path.join(services.dataDir, relativePath);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, content);
    };

    beforeEach(() => {
        services = createTestServices();
        reader = new DatasetReaderService(services.configService, services.loggingService);
    });

    afterEach(() => services.cleanup());

    it('concatenates every CSV file under the data directory, nested ones included', async () => {
        writeDataFile('a.csv', 'Country/Region,Confirmed\nItaly,100\n');
        writeDataFile('nested/b.CSV', 'Country_Region,Deaths,Lat\nFrance,3,46.2\n');
        writeDataFile('notes.txt', 'not,a,table\n');

        const table = await reader.readAll();

        expect(table.columns).toEqual(['Country/Region', 'Confirmed', 'Country_Region', 'Deaths', 'Lat']);
        expect(table.rows).toEqual([
            { 'Country/Region': 'Italy', Confirmed: '100' },
            { Country_Region: 'France', Deaths: '3', Lat: '46.2' },
        ]);
    });

    it('skips a file that cannot be parsed and keeps the others', async () => {
        writeDataFile('a.csv', 'Country/Region,Confirmed\nItaly,100\n');
        writeDataFile('broken.csv', 'Country/Region,Confirmed\n"Italy,1\n');

        const table = await reader.readAll();

        expect(table.rows).toEqual([{ 'Country/Region': 'Italy', Confirmed: '100' }]);
    });

    it('throws NoDataError when the directory holds no CSV file', async () => {
        await expect(reader.readAll()).rejects.toBeInstanceOf(NoDataError);
        await expect(reader.readAll()).rejects.toMatchObject({
            workingDir: services.dataDir,
            filesSeen: 0,
            statusCode: 503,
        });
    });

    it('throws NoDataError when every CSV file is unreadable', async () => {
        writeDataFile('broken.csv', 'a,b\n"x,1\n');

        await expect(reader.readAll()).rejects.toMatchObject({
            name: 'NoDataError',
            filesSeen: 1,
            message: `None of the 1 CSV file(s) in "${services.dataDir}" could be parsed.`,
        });
    });

    it('skips an empty file instead of treating it as an empty table', async () => {
        writeDataFile('empty.csv', '');

        await expect(reader.readAll()).rejects.toMatchObject({ name: 'NoDataError', filesSeen: 1 });

        writeDataFile('a.csv', 'Country/Region\nItaly\n');
        await expect(reader.readAll()).resolves.toEqual({
            columns: ['Country/Region'],
            rows: [{ 'Country/Region': 'Italy' }],
        });
    });

    it('reads an explicit working directory', async () => {
        const otherDir = path.join(services.rootDir, 'other');
        fs.mkdirSync(otherDir);
        fs.writeFileSync(path.join(otherDir, 'x.csv'), 'Country/Region\nPeru\n');

        const table = await reader.readAll(otherDir);

        expect(table.rows).toEqual([{ 'Country/Region': 'Peru' }]);
    });
});

describe('parseCsv', () => {
    it('leaves empty cells out of the record and tolerates short rows', () => {
        expect(parseCsv('\uFEFFCountry/Region,Confirmed,Deaths\nItaly,,4\nFrance\n')).toEqual({
            columns: ['Country/Region', 'Confirmed', 'Deaths'],
            rows: [{ 'Country/Region': 'Italy', Deaths: '4' }, { 'Country/Region': 'France' }],
        });
    });

    it('keeps quoted separators inside a field', () => {
        expect(parseCsv('Country/Region,Confirmed\n"Korea, South",5\n').rows).toEqual([
            { 'Country/Region': 'Korea, South', Confirmed: '5' },
        ]);
    });

    it('returns the header for a file without data rows', () => {
        expect(parseCsv('a,b\n')).toEqual({ columns: ['a', 'b'], rows: [] });
    });

    it('rejects a document without a header row', () => {
        expect(() => parseCsv('')).toThrow('CSV document has no header row.');
        expect(() => parseCsv('\n\n')).toThrow('CSV document has no header row.');
    });

    it('throws on an unterminated quote', () => {
        expect(() => parseCsv('a,b\n"x,1\n')).toThrow();
    });
});

describe('concatTables', () => {
    it('unions columns in first-seen order', () => {
        const combined = concatTables([
            { columns: ['a', 'b'], rows: [{ a: '1' }] },
            { columns: ['b', 'c'], rows: [{ c: '2' }] },
        ]);

        expect(combined).toEqual({ columns: ['a', 'b', 'c'], rows: [{ a: '1' }, { c: '2' }] });
    });
});
