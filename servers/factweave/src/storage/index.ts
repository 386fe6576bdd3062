export { MemoryStorage } from './memory.js';
export { SqliteStorage } from './sqlite.js';
export { Neo4jStorage } from './neo4j.js';
