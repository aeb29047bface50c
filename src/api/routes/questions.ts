import { Router } from "express";
import { questionNotFound } from "../../domain/errors";
import { QuestionStore } from "../../stores/questionStore";
import { RatingService } from "../../services/ratingService";
import { queryNumber } from "../requestParsing";
import { ratingToJson } from "../serializers";

export function createQuestionsRouter(questions: QuestionStore, ratings: RatingService): Router {
  const router = Router();

  // GET /api/v1/questions/stats - Size of the question corpus
  router.get("/stats", async (req, res, next) => {
    try {
      res.json({ total_questions: await questions.count() });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/questions/low-rated?threshold=2.5
  router.get("/low-rated", (req, res, next) => {
    try {
      const threshold = queryNumber(req.query.threshold, "threshold") ?? 2.5;
      res.json(
        ratings.getLowRatedQuestions(threshold).map((summary) => ({
          question_id: summary.questionId,
          average: summary.average,
          count: summary.count,
        }))
      );
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/questions/:id/ratings - Average rating for a known question
  router.get("/:id/ratings", async (req, res, next) => {
    try {
      const question = await questions.getById(req.params.id);
      if (!question) {
        throw questionNotFound(req.params.id);
      }
      const summary = ratings.getAverageRating(question.id);
      res.json({
        question_id: summary.questionId,
        average: summary.average,
        count: summary.count,
        ratings: ratings.getRatings(question.id).map(ratingToJson),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
