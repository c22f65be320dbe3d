export * from "./figshareClient";
export * from "./selector";
