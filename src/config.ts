import * as dotenv from "dotenv";

// .env.local first, then .env fills anything still unset
dotenv.config({ path: ".env.local" });
dotenv.config();

export type LogLevelName = "debug" | "info" | "warn" | "error";

function parseLevel(raw: string | undefined): LogLevelName {
  const v = String(raw || "").trim().toLowerCase();
  return v === "debug" || v === "warn" || v === "error" ? v : "info";
}

export const CFG = {
  http: {
    userAgent: "crypto-price-race/1.0",
  },
  log: {
    enabled: ["1", "true"].includes(String(process.env.PRICE_LOG || "").toLowerCase()),
    level: parseLevel(process.env.PRICE_LOG_LEVEL),
    service: "crypto-price-race",
  },
};
