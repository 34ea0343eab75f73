export { expandTemplate, findUnresolvedPlaceholders, loadSqlFile } from "./expand";
