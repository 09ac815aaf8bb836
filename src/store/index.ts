import { MongoCrmStore } from "./mongoStore";
import { CrmStore } from "./types";

export type { CrmStore } from "./types";

// Created lazily so importing a controller does not touch the connection
let store: CrmStore | null = null;

export const getCrmStore = (): CrmStore => {
  if (!store) {
    store = new MongoCrmStore();
  }
  return store;
};
