import express from "express";
import { InvalidRequestError } from "../errors";
import { describeIssues, processQuerySchema } from "../schemas/requests";
import { Processor } from "../pipeline/processor";

export function queryRouter(processor: Processor) {
  const router = express.Router();

  router.post("/process_query", async (req, res, next) => {
    const body = processQuerySchema.safeParse(req.body);
    if (!body.success) {
      return next(new InvalidRequestError(`Invalid query request: ${describeIssues(body.error)}`));
    }
    try {
      res.send(await processor.process(body.data.query));
    } catch (e) {
      next(e);
    }
  });

  return router;
}
