export { HttpClient, formatRangeHeader } from "./HttpClient";
