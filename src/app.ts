import express from "express";
import { z } from "zod";
import { handleUserMessage } from "./conversations/engine";
import { getOrCreateSession, saveSession, startNewSession } from "./conversations/sessions";
import { destinationsRouter } from "./api/routes/destinations";
import { metaRouter } from "./api/routes/meta";
import { badRequestFromZod, sendRouteError } from "./http/routeErrors";
import { getAppContainer } from "./runtime/appContainer";

const ChatRequestSchema = z.object({
  sessionId: z.string().min(1).nullish(),
  message: z.string().trim().min(1, "Message is required.")
});

const NewSessionRequestSchema = z.object({
  sessionId: z.string().min(1).nullish()
});

export const app = express();

app.use(express.json());
app.use("/api/meta", metaRouter);
app.use("/api/destinations", destinationsRouter);

app.get("/api/health", (_req, res) => {
  try {
    res.json({ ok: true, cities: getAppContainer().getCatalog().length });
  } catch (error) {
    sendRouteError(res, error, "City catalog unavailable.");
  }
});

app.post("/api/chat", async (req, res) => {
  try {
    const parse = ChatRequestSchema.safeParse(req.body ?? {});
    if (!parse.success) {
      throw badRequestFromZod("Message is required.", parse.error);
    }
    const container = getAppContainer();
    const session = getOrCreateSession(parse.data.sessionId);
    const turn = await handleUserMessage(session, parse.data.message, {
      llm: container.getLLMClient(),
      catalog: container.getCatalog()
    });
    saveSession(turn.session);

    res.json({
      sessionId: turn.session.id,
      reply: turn.reply,
      messages: turn.newMessages
    });
  } catch (error) {
    sendRouteError(res, error, "Failed to handle message.");
  }
});

app.post("/api/session/new", (req, res) => {
  const parse = NewSessionRequestSchema.safeParse(req.body ?? {});
  const session = startNewSession(parse.success ? parse.data.sessionId : null);
  res.json({ sessionId: session.id, messages: session.history });
});
