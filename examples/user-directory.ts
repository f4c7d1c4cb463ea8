/**
 * User Directory Example
 *
 * A repository whose methods are thin wrappers over stored procedures.
 * The procedures live in examples/user-directory.sql.
 *
 * Run against a database with:
 *   DATABASE_URL=postgres://app@localhost:5432/app
 */

import {
  createProcedureInvoker,
  defineRecord,
  field,
  type InferRecord,
  type ProcedureInvoker,
} from "../src/main/index.js";

export const User = defineRecord("User", {
  id: field.integer(),
  userName: field.string().column("user_name"),
  email: field.string().optional(),
  isActive: field.boolean().default(true),
  createdAt: field.date().column("created_at"),
});

export type User = InferRecord<typeof User>;

export class UserDirectory {
  constructor(
    private readonly invoker: ProcedureInvoker,
    private readonly connection = "default",
  ) {}

  getUser(id: number): Promise<User | null> {
    return this.invoker.fetchOne(this.connection, "get_user", User, { id });
  }

  listActiveUsers(): Promise<User[]> {
    return this.invoker.fetchMany(this.connection, "list_active_users", User);
  }

  renameUser(id: number, userName: string): Promise<void> {
    return this.invoker.run(this.connection, "rename_user", {
      id,
      user_name: userName,
    });
  }

  deleteUser(id: number): Promise<void> {
    return this.invoker.run(this.connection, "delete_user", { id });
  }
}

async function main() {
  const directory = new UserDirectory(createProcedureInvoker());

  const users = await directory.listActiveUsers();
  console.log(`[UserDirectory] ${users.length} active user(s)`);

  const first = users[0];
  if (first) {
    await directory.renameUser(first.id, `${first.userName}-renamed`);
    console.log("[UserDirectory] Renamed:", await directory.getUser(first.id));
  }
}

if (process.argv[1]?.endsWith("user-directory.ts")) {
  main().catch((err) => {
    console.error("[UserDirectory] Failed:", err);
    process.exit(1);
  });
}
