export { getDb, getPool, closePool } from "./client";
