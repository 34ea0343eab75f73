export { cleanColumnName, cleanHeader } from "./clean";
export { reconcile } from "./reconcile";
