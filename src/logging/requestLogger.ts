import chalk from "chalk";

import logger from "./logger.js";

import type { Request } from "express";

function formatMethod(method: string): string {
  const upperMethod = method.toUpperCase();

  switch (upperMethod) {
    case "GET":
      return chalk.green(upperMethod);
    case "POST":
      return chalk.yellow(upperMethod);
    default:
      return chalk.white(upperMethod);
  }
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  if (status >= 300) {return chalk.cyan;}
  if (status >= 200) {return chalk.green;}
  return chalk.white;
}

function getStatusText(status: number): string {
  const statusMap: Record<number, string> = {
    200: "OK",
    400: "Bad Request",
    404: "Not Found",
    499: "Client Closed Request",
    500: "Internal Server Error",
    507: "Insufficient Storage",
  };

  return statusMap[status] ?? "";
}

export function logRequest(req: Request, routeName: string): void {
  const timestamp = new Date().toISOString();
  const method = formatMethod(req.method);
  const endpoint = chalk.cyan(req.originalUrl);

  logger.info(`${chalk.blue("➤")} ${chalk.dim(timestamp)} ${method} ${endpoint} ${chalk.yellow(routeName)}`);
}

export function logResponse(
  status: number,
  routeName: string,
  duration?: number,
  pairs?: number,
  note?: string,
): void {
  const statusColor = getStatusColor(status);
  const statusText = statusColor(`${status} ${getStatusText(status)}`);

  let output = `${chalk.blue("⮑")} ${statusText} ${chalk.yellow(routeName)}`;

  if (pairs !== undefined) {
    output += ` ${chalk.dim("pairs:")} ${chalk.magenta(String(pairs))}`;
  }
  if (duration) {
    output += ` ${chalk.dim("in")} ${chalk.magenta(duration + "ms")}`;
  }
  if (note !== undefined) {
    output += ` ${chalk.red(note)}`;
  }

  logger.info(output);
}

export default {
  logRequest,
  logResponse,
};
