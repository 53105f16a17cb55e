import { Router } from "express";
import { z } from "zod";
import type { RatingEngine } from "../utils/rating_engine";
import { InvalidMatchError, InvalidPlayerError, RatingError } from "../types/errors";
import { renderRankings } from "../views/rankings";
import { renderAddPlayerForm, renderReportForm } from "../views/forms";
import { asyncHandler } from "./async_handler";

const MatchReportSchema = z.object({
  winner: z.string({ required_error: "Select a winner." }).trim().min(1, "Select a winner."),
  loser: z.string({ required_error: "Select a loser." }).trim().min(1, "Select a loser."),
});

const NewPlayerSchema = z.object({
  name: z.string({ required_error: "Player name is required." }).trim().min(1, "Player name is required."),
  character: z.string({ required_error: "Character is required." }).trim().min(1, "Character is required."),
});

const firstIssue = (error: z.ZodError) => error.issues[0]?.message ?? "Invalid form data.";

// Submitted values go back into the form as typed, even when they did not validate
const submitted = (body: unknown, field: string): string | undefined => {
  if (typeof body !== "object" || body === null || !(field in body)) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === "string" ? value : undefined;
};

// Storage failures and anything unexpected still go to the error page
const userFacing = (err: unknown) => (err instanceof RatingError && err.isUserFacing ? err : null);

export function smashRouter(engine: RatingEngine): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const players = await engine.listPlayers();
      res.send(renderRankings(players));
    })
  );

  router.get(
    "/report",
    asyncHandler(async (_req, res) => {
      const players = await engine.listPlayers();
      res.send(renderReportForm(players));
    })
  );

  router.post(
    "/report",
    asyncHandler(async (req, res) => {
      try {
        const form = MatchReportSchema.safeParse(req.body);
        if (!form.success) throw new InvalidMatchError(firstIssue(form.error));
        await engine.applyResult(form.data.winner, form.data.loser);
      } catch (err) {
        const rejected = userFacing(err);
        if (!rejected) throw err;

        const players = await engine.listPlayers();
        res.status(rejected.status).send(
          renderReportForm(players, {
            winner: submitted(req.body, "winner"),
            loser: submitted(req.body, "loser"),
            error: rejected.message,
          })
        );
        return;
      }

      res.redirect(303, "/smash");
    })
  );

  router.get("/players/new", (_req, res) => {
    res.send(renderAddPlayerForm());
  });

  router.post(
    "/players",
    asyncHandler(async (req, res) => {
      try {
        const form = NewPlayerSchema.safeParse(req.body);
        if (!form.success) throw new InvalidPlayerError(firstIssue(form.error));
        await engine.addPlayer(form.data.name, form.data.character);
      } catch (err) {
        const rejected = userFacing(err);
        if (!rejected) throw err;

        res.status(rejected.status).send(
          renderAddPlayerForm(
            { name: submitted(req.body, "name"), character: submitted(req.body, "character") },
            rejected.message
          )
        );
        return;
      }

      res.redirect(303, "/smash");
    })
  );

  return router;
}
