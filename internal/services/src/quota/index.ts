export { QuotaPolicy, mayIssue } from "./policy"
