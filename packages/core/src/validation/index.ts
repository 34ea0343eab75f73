export { assertValidTableName, isValidTableName, quoteIdentifier } from "./identifier";
