import { readFile } from "fs/promises";
import { z } from "zod";
import { AccountSeed } from "./InMemoryPaymentStore";
import { compareMoney, normalizeMoney } from "../../../shared/money";

const accountSeedSchema = z.array(
  z.object({
    id: z.number().int().positive(),
    ownerUserId: z.number().int().positive(),
    balance: z
      .string()
      .transform((value) => normalizeMoney(value))
      .refine((value) => compareMoney(value, "0.00") >= 0, "must not be negative")
  })
);

export const parseAccountSeeds = (raw: string): AccountSeed[] => {
  const decoded: unknown = JSON.parse(raw);
  return accountSeedSchema.parse(decoded);
};

export const loadAccountSeeds = async (path: string): Promise<AccountSeed[]> => {
  return parseAccountSeeds(await readFile(path, "utf8"));
};
