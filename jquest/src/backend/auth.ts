import { Client, CredentialVerifier, Supplier } from "@jquest/resources-core";
import { User } from "../resources/user";
import { verifyPassword } from "./passwords";

const stringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];

/**
 * Checks credentials against the stored accounts. Inactive accounts and
 * accounts without a password never authenticate.
 */
export const accountVerifier =
  (supplier: Supplier): CredentialVerifier =>
  async (username, password): Promise<Client | null> => {
    const store = await supplier.store(User);
    const [user] = await store.filter({ username: { $eq: username } });
    if (!user || user.is_active !== true) return null;
    if (typeof user.password !== "string" || user.password === "") return null;
    if (!(await verifyPassword(password, user.password))) return null;

    return {
      id: user.id,
      username,
      isSuperuser: user.is_superuser === true,
      permissions: stringList(user.user_permissions),
    };
  };
