/**
 * Raw IndexedDB access for setting up and inspecting databases around the code under test.
 */

import { expect } from 'chai';

export function openRaw(
	name: string,
	version: number,
	onUpgrade?: (database: IDBDatabase, oldVersion: number) => void
): Promise<IDBDatabase> {
	return new Promise((resolve, reject) => {
		const request = indexedDB.open(name, version);
		request.onupgradeneeded = (event) => onUpgrade?.(request.result, event.oldVersion);
		request.onsuccess = () => resolve(request.result);
		request.onerror = () => reject(request.error);
	});
}

export function deleteDatabase(name: string): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const req = indexedDB.deleteDatabase(name);
		req.onsuccess = () => resolve();
		req.onerror = () => reject(req.error);
	});
}

/** Write a value straight into an object store of an existing version-1 database. */
export async function putRaw(name: string, storeName: string, key: IDBValidKey, value: unknown): Promise<void> {
	const db = await openRaw(name, 1);
	try {
		await new Promise<void>((resolve, reject) => {
			const tx = db.transaction(storeName, 'readwrite');
			tx.objectStore(storeName).put(value, key);
			tx.oncomplete = () => resolve();
			tx.onerror = () => reject(tx.error);
		});
	} finally {
		db.close();
	}
}

export async function countRaw(name: string, storeName: string): Promise<number> {
	const db = await openRaw(name, 1);
	try {
		return await new Promise<number>((resolve, reject) => {
			const request = db.transaction(storeName, 'readonly').objectStore(storeName).count();
			request.onsuccess = () => resolve(request.result);
			request.onerror = () => reject(request.error);
		});
	} finally {
		db.close();
	}
}

/** The rejection reason of `promise`; fails the test if it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (err) {
		return err;
	}
	expect.fail('should have thrown');
}
