import postgres from "postgres";

const connectionString = process.env.DATABASE_URL;

if (!connectionString) {
  throw new Error("DATABASE_URL is required");
}

// PgBouncer in transaction mode does not support named prepared statements;
// prepare: false uses the simple query protocol instead.
export const sql = postgres(connectionString, {
  prepare: false,
  max: 3
});
