import { Supplier } from "@jquest/resources-core";
import { User } from "../resources/user";
import { hashPassword } from "./passwords";

/**
 * Makes sure a superuser with the given credentials exists. Returns whether
 * one was created.
 */
export const seedSuperuser = async (
  supplier: Supplier,
  { username, password }: { username: string; password: string }
) => {
  const store = await supplier.store(User);
  const existing = await store.filter({ username: { $eq: username } });
  if (existing.length > 0) return false;

  await store.insert({
    username,
    password: await hashPassword(password),
    first_name: "",
    last_name: "",
    email: "",
    is_active: true,
    is_staff: true,
    is_superuser: true,
    date_joined: new Date(),
    last_login: null,
    user_permissions: [],
  });
  return true;
};
