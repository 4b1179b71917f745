import { format } from 'node:util';
import { expect } from 'chai';
import 'fake-indexeddb/auto';
import { HeaderDatabase } from '../src/database.js';
import { disableLogging, enableLogging } from '../src/common/logger.js';
import { deleteDatabase } from './helpers.js';

describe('logging', () => {
	const testDbName = 'test-logging-db';

	afterEach(async () => {
		disableLogging();
		await deleteDatabase(testDbName);
	});

	it('routes enabled namespaces to the given function', async () => {
		const lines: string[] = [];
		enableLogging('lightdb:indexeddb:database', (...args: unknown[]) => {
			const [first, ...rest] = args;
			lines.push(format(first, ...rest));
		});

		const db = await HeaderDatabase.open(testDbName);
		await db.close();

		expect(lines.some(line => line.includes(`Opened ${testDbName}`))).to.be.true;
		expect(lines.some(line => line.includes(`Closed ${testDbName}`))).to.be.true;
	});

	it('stays quiet for namespaces that are not enabled', async () => {
		const lines: string[] = [];
		enableLogging('lightdb:indexeddb:schema', (...args: unknown[]) => {
			const [first, ...rest] = args;
			lines.push(format(first, ...rest));
		});

		const db = await HeaderDatabase.open(testDbName);
		await db.close();

		expect(lines.some(line => line.includes('Creating version 1 stores'))).to.be.true;
		expect(lines.some(line => line.includes('Opened'))).to.be.false;
	});
});
