import axios, { type AxiosInstance } from "axios";
import { CFG } from "../config.js";

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { Accept: "application/json", "User-Agent": CFG.http.userAgent },
  });
}

export const http = createHttpClient();
