import { z } from 'zod';

// Ledger amounts arrive as JSON numbers, occasionally as numeric strings.
const AmountSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'must be a decimal amount')
    .transform(Number),
]);

export const ReferenceSchema = z
  .object({
    value: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

export const LineRecordSchema = z
  .object({
    Id: z.string().optional(),
    Amount: AmountSchema.nullable().optional(),
    Description: z.string().optional(),
    DetailType: z.string().optional(),
    SalesItemLineDetail: z.object({ ItemRef: ReferenceSchema.nullable().optional() }).passthrough().nullable().optional(),
    AccountBasedExpenseLineDetail: z
      .object({ AccountRef: ReferenceSchema.nullable().optional() })
      .passthrough()
      .nullable()
      .optional(),
    ItemBasedExpenseLineDetail: z.object({ ItemRef: ReferenceSchema.nullable().optional() }).passthrough().nullable().optional(),
  })
  .passthrough();

export type LineRecordDTO = z.infer<typeof LineRecordSchema>;

const DocumentRecordSchema = z
  .object({
    Id: z.string(),
    TxnDate: z.string().optional(),
    TotalAmt: AmountSchema,
    Balance: AmountSchema.nullable().optional(),
    Line: z.array(LineRecordSchema).optional(),
  })
  .passthrough();

export const InvoiceRecordSchema = DocumentRecordSchema.extend({
  CustomerRef: ReferenceSchema.nullable().optional(),
});

export type InvoiceRecordDTO = z.infer<typeof InvoiceRecordSchema>;

export const BillRecordSchema = DocumentRecordSchema.extend({
  VendorRef: ReferenceSchema.nullable().optional(),
});

export type BillRecordDTO = z.infer<typeof BillRecordSchema>;

export const AccountRecordSchema = z
  .object({
    Id: z.string(),
    Name: z.string().optional(),
    CurrentBalance: AmountSchema,
    AccountType: z.string().nullable().optional(),
    AccountSubType: z.string().optional(),
    Active: z.boolean().optional(),
  })
  .passthrough();

export type AccountRecordDTO = z.infer<typeof AccountRecordSchema>;

export const QueryResponseSchema = z
  .object({
    QueryResponse: z.record(z.unknown()).optional(),
    Fault: z
      .object({
        type: z.string().optional(),
        Error: z
          .array(
            z
              .object({
                Message: z.string().optional(),
                Detail: z.string().optional(),
                code: z.string().optional(),
              })
              .passthrough(),
          )
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type QueryResponseDTO = z.infer<typeof QueryResponseSchema>;
