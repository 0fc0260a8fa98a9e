import { z } from "zod";
import { Category } from "../../models/transaction";

// Semantic rules (date pattern, positive amount, category) live in the Record Model;
// these schemas only check shape before a request reaches it.

export const createTransactionSchema = z.object({
  date: z.string(),
  amount: z.number(),
  category: z.string(),
  description: z.string().trim().min(1),
});

export const updateTransactionSchema = z
  .object({
    date: z.string().optional(),
    amount: z.number().optional(),
    category: z.nativeEnum(Category).optional(),
    description: z.string().trim().min(1).optional(),
  })
  .strict()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "At least one field must be supplied",
  });

export const transactionIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const filtersSchema = z.object({
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  category: z.nativeEnum(Category).optional(),
  description: z.string().optional(),
  minAmount: z.coerce.number().optional(),
  maxAmount: z.coerce.number().optional(),
});

const fileNameSchema = z.string().regex(/^(?!\.{1,2}$)[\w.-]+$/, "Invalid file name");

export const exportSchema = z.object({
  format: z.enum(["json", "xlsx"]),
  filename: fileNameSchema,
});

export const importSchema = z.object({
  filename: fileNameSchema,
});
