import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import { DuplicateStockError } from "../common/errors";
import type { StockStore } from "../stock/stock.store";
import { corsMiddleware } from "./cors";

const inventoryBody = z.object({
  product_id: z.number().int().positive(),
  quantity: z.number().int().nonnegative(),
});

const productIdParam = z.coerce.number().int().positive();

type InventoryBody = z.infer<typeof inventoryBody>;

function parseBody(
  req: Request,
  res: Response
): InventoryBody | undefined {
  const parsed = inventoryBody.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      error: "Invalid request body",
      details: parsed.error.flatten().fieldErrors,
    });
    return undefined;
  }
  return parsed.data;
}

function parseProductId(req: Request): number | undefined {
  const parsed = productIdParam.safeParse(req.params.productId);
  return parsed.success ? parsed.data : undefined;
}

export function createApp(store: StockStore): Express {
  const app = express();

  app.use(corsMiddleware);
  app.use(express.json());

  app.get("/health", async (_req, res) => {
    try {
      await store.ping();
      res.json({ status: "healthy" });
    } catch (error) {
      res.status(503).json({
        status: "unhealthy",
        error: (error as Error).message,
      });
    }
  });

  app.get("/inventory/:productId", async (req, res) => {
    const productId = parseProductId(req);
    if (productId === undefined) {
      res.status(404).json({ error: "Product not found" });
      return;
    }

    try {
      const quantity = await store.getQuantity(productId);
      if (quantity === null) {
        res.status(404).json({ error: "Product not found" });
        return;
      }
      res.json({ available: quantity > 0, quantity });
    } catch (error) {
      console.error(`Failed to read inventory for product ${productId}`, {
        error: (error as Error).message,
      });
      res.status(404).json({ error: "Product not found" });
    }
  });

  app.post("/inventory", async (req, res) => {
    const body = parseBody(req, res);
    if (!body) return;

    try {
      await store.createStock(body.product_id, body.quantity);
      res.status(201).json(body);
    } catch (error) {
      if (!(error instanceof DuplicateStockError)) {
        console.error(`Failed to create inventory for product ${body.product_id}`, {
          error: (error as Error).message,
        });
      }
      res.status(400).json({ error: "Insert failed" });
    }
  });

  app.put("/inventory/:productId", async (req, res) => {
    const productId = parseProductId(req);
    if (productId === undefined) {
      res.status(400).json({ error: "Invalid product id" });
      return;
    }
    const body = parseBody(req, res);
    if (!body) return;

    try {
      // An update that matches no row still answers 200.
      const updated = await store.updateStock(productId, body.quantity);
      if (!updated) {
        console.warn(`No inventory row to update for product ${productId}`);
      }
      res.json({ product_id: productId, quantity: body.quantity });
    } catch (error) {
      console.error(`Failed to update inventory for product ${productId}`, {
        error: (error as Error).message,
      });
      res.status(400).json({ error: "Update failed" });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // express.json() reports unparseable bodies through here.
  app.use(
    (error: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: "Invalid JSON body" });
        return;
      }
      console.error("Unhandled HTTP error:", error.message);
      res.status(400).json({ error: "Bad request" });
    }
  );

  return app;
}
