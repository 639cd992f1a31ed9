import { createContext } from "effection";

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  debug: (message) => console.debug(message),
};

export const LoggerContext = createContext<Logger>(
  "sitemap.logger",
  consoleLogger,
);
