export {
  validateAmount,
  validateDate,
  validateCategory,
  validateDescription,
  validateExpense,
  type FieldResult,
  type ExpenseValidationResult,
  type ExpenseFields,
  type ValidatedExpense,
  type ValidationOptions,
} from "./ExpenseValidator";
