import express, { type Request, type Response } from "express";

import convertHandler from "../handlers/convertHandler.js";
import profilesHandler from "../handlers/profilesHandler.js";

export function createConversionApp(): express.Express {
  const app = express();

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      service: "PairStream Conversion Server",
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/profiles", profilesHandler);

  // Body is streamed straight into the parser: no body-parsing middleware here
  app.post("/convert/:profile", convertHandler);

  return app;
}
