export { decomposeList, STRAY_ITEM_CONFIDENCE } from "./list.js";
export { decomposeTable } from "./table.js";
