export * from "./allocation-governor"
export * from "./fallible-allocation"
