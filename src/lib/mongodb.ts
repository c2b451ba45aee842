import { MongoClient, Db, type Document } from "mongodb";

let client: MongoClient | null = null;
let cachedDb: Db | null = null;

export async function connectToDatabase(uri: string) {
	if (cachedDb) return cachedDb;

	client = new MongoClient(uri);
	await client.connect();
	const db = client.db();
	cachedDb = db;
	return db;
}

export function getCollection<T extends Document>(db: Db, name: string) {
	return db.collection<T>(name);
}

export async function closeDatabase() {
	if (!client) return;
	await client.close();
	client = null;
	cachedDb = null;
}
