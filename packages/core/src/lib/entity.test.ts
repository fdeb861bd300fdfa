import { singularEntityName } from "./entity";

describe("singularEntityName", () => {
  it.each([
    ["customers", "Customer"],
    ["customer", "Customer"],
    ["Customer", "Customer"],
    ["sales_receipts", "SalesReceipt"],
    ["SalesReceipt", "SalesReceipt"],
    ["journal_entry", "JournalEntry"],
    ["company_info", "CompanyInfo"],
    ["classes", "Class"],
    ["preferences", "Preferences"],
    ["entitlements", "Entitlements"],
    ["attachables", "Attachable"],
  ])("should map %s to %s", (entity, expected) => {
    expect(singularEntityName(entity)).toBe(expected);
  });
});
