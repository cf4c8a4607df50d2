import { Router } from "express";
import { keyService as defaultKeyService, type KeyService } from "../services/keyService";
import {
  deriveRequestSchema,
  exportRequestSchema,
  generateRequestSchema,
  importRequestSchema,
  parseBody,
  publicKeyRequestSchema,
} from "../lib/validation";

export function createKeyRouter(keyService: KeyService = defaultKeyService): Router {
  const router = Router();

  router.post("/api/keys/generate", (req, res) => {
    const { compressed, network } = parseBody(generateRequestSchema, req.body ?? {});
    res.status(201).json(keyService.generate(compressed, network));
  });

  router.post("/api/keys/derive", (req, res) => {
    const { privateKeyHex, compressed, network } = parseBody(deriveRequestSchema, req.body);
    res.json(keyService.derive(privateKeyHex, compressed, network));
  });

  router.post("/api/keys/export", (req, res) => {
    const { privateKeyHex, compressed, parameters } = parseBody(exportRequestSchema, req.body);
    res.json({ recordHex: keyService.exportRecord(privateKeyHex, compressed, parameters) });
  });

  router.post("/api/keys/import", (req, res) => {
    const { recordHex, network } = parseBody(importRequestSchema, req.body);
    res.json(keyService.importRecord(recordHex, network));
  });

  router.post("/api/keys/public", (req, res) => {
    const { publicKeyHex, compressed, network } = parseBody(publicKeyRequestSchema, req.body);
    res.json(keyService.describePublicKey(publicKeyHex, compressed, network));
  });

  return router;
}

export default createKeyRouter();
