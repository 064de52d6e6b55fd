export {
  Expense,
  expenseDataSchema,
  type ExpenseData,
  type CreateExpenseInput,
} from "./Expense";
