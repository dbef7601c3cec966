import type { PriceProvider } from "../types.js";
import { cmc } from "./cmc.js";
import { coingecko } from "./coingecko.js";
import { cryptocompare } from "./cryptocompare.js";

export const PROVIDERS: readonly PriceProvider[] = [coingecko, cmc, cryptocompare];
