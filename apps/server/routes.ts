import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import type { ZodType, ZodTypeDef } from "zod";
import { DecodeError, isGeokitError, ParseError, ArgumentError, type GeokitError } from "@utils";
import {
  cipherRequestSchema,
  coordsRequestSchema,
  geometryRequestSchema,
  toolsRequestSchema,
} from "@shared/schema";
import { cipherService, coordsService, geometryService, toolsService } from "./services";
import type { ServerConfig } from "./config";
import { log, logError } from "./logger";

function errorDetails(error: GeokitError): Record<string, string | number> | undefined {
  if (error instanceof DecodeError) {
    return { token: error.token, position: error.position };
  }
  if (error instanceof ParseError && error.position !== undefined) {
    return { position: error.position };
  }
  if (error instanceof ArgumentError && error.field !== undefined) {
    return { field: error.field };
  }
  return undefined;
}

// Body validation, then the command; calculation errors become 422.
function commandHandler<T>(
  command: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  run: (input: T) => object
) {
  return (req: Request, res: Response) => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    try {
      res.json(run(parsed.data));
    } catch (error) {
      if (isGeokitError(error)) {
        log(`${command} rejected: ${error.code} ${error.message}`, command);
        return res.status(422).json({
          error: error.message,
          code: error.code,
          details: errorDetails(error),
        });
      }
      logError(`${command} failed`, error, command);
      res.status(500).json({ error: `Failed to run ${command} command` });
    }
  };
}

export async function registerRoutes(app: Express, config: ServerConfig): Promise<Server> {
  // ============================================================================
  // HEALTH
  // ============================================================================

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      wordListSize: config.wordList.length,
      maxPoints: Number.isFinite(config.geometry.max_points) ? config.geometry.max_points : null,
    });
  });

  // ============================================================================
  // COMMANDS
  // ============================================================================

  app.post("/api/cipher", commandHandler("cipher", cipherRequestSchema, cipherService.runCipher));

  app.post("/api/coords", commandHandler("coords", coordsRequestSchema, coordsService.runCoords));

  app.post(
    "/api/geometry",
    commandHandler("geometry", geometryRequestSchema, request =>
      geometryService.runGeometry(request, config.geometry)
    )
  );

  app.post(
    "/api/tools",
    commandHandler("tools", toolsRequestSchema, request =>
      toolsService.runTools(request, config.wordList)
    )
  );

  const httpServer = createServer(app);
  return httpServer;
}
