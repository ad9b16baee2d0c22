import { faker } from "@faker-js/faker";
import type { Row } from "../lib/dmql/database";
import { DATABASE_SEPARATOR } from "../lib/dmql/translator";
import type { SqliteDatabaseContext } from "./adapter";

const CITIES = ["Mumbai", "Delhi", "Pune", "Chennai", "Kolkata", "Bengaluru"];
const CATEGORIES = ["electronics", "groceries", "clothing", "books", "furniture"];

export interface SeedOptions {
  database?: string;
  customers?: number;
  transactions?: number;
  seed?: number;
}

/**
 * Seed a logical database with sample customers and transactions using Faker.
 * The same seed always produces the same rows.
 */
export function seedDatabase(ctx: SqliteDatabaseContext, options: SeedOptions = {}): void {
  const database = options.database ?? "sales";
  const numCustomers = options.customers ?? 200;
  const numTransactions = options.transactions ?? 500;

  // Use seed for deterministic results
  faker.seed(options.seed ?? 12345);

  console.log(`Seeding ${numCustomers} customers into ${database}...`);

  const customers: Row[] = [];
  for (let i = 1; i <= numCustomers; i++) {
    customers.push({
      id: i,
      name: faker.person.fullName(),
      email: faker.internet.email().toLowerCase(),
      age: faker.number.int({ min: 18, max: 67 }),
      city: faker.helpers.arrayElement(CITIES),
      income: faker.number.int({ min: 20000, max: 150000 }),
      purchase_amount: faker.number.float({ min: 100, max: 10000, fractionDigits: 2 }),
    });
  }
  ctx.loadRows("customers", customers, database);

  console.log(`Seeding ${numTransactions} transactions into ${database}...`);

  const transactions: Row[] = [];
  for (let i = 1; i <= numTransactions; i++) {
    transactions.push({
      id: i,
      customer_id: faker.number.int({ min: 1, max: numCustomers }),
      category: faker.helpers.arrayElement(CATEGORIES),
      amount: faker.number.float({ min: 1, max: 2000, fractionDigits: 2 }),
      quantity: faker.number.int({ min: 1, max: 10 }),
      returned: faker.datatype.boolean({ probability: 0.1 }), // 10% returned
    });
  }
  ctx.loadRows("transactions", transactions, database);

  console.log("Database seeded successfully!");
}

/**
 * Drop every table of a logical database
 */
export function clearDatabase(ctx: SqliteDatabaseContext, database: string = "sales"): void {
  for (const table of ctx.listTables(database)) {
    ctx.dropTable(`${database}${DATABASE_SEPARATOR}${table}`);
  }

  console.log(`Database ${database} cleared successfully!`);
}
