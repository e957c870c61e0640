// ============================================
// RouterService
// Scores a message against weighted keyword tables and picks an agent.
// Deterministic: case-insensitive substring matching, no tokenizer.
// ============================================

import { z } from 'zod';
import {
   AGENT_CATEGORIES,
   CATEGORY_PRIORITY,
   DEFAULT_CATEGORY,
   type AgentCategory,
} from '../shared/agent-categories';
import keywordWeightsData from './keyword-weights.json';

export type ScoreVector = Record<AgentCategory, number>;

/** category → (lowercased keyword → weight) */
export type KeywordWeightTable = Readonly<
   Record<AgentCategory, Readonly<Record<string, number>>>
>;

/** One scoring step that fired, kept for logs and routing events */
export interface ScoreContribution {
   category: AgentCategory;
   points: number;
   reason: string;
}

export interface ScoreBreakdown {
   scores: ScoreVector;
   contributions: ScoreContribution[];
}

export interface RoutingDecision extends ScoreBreakdown {
   /** Agent that handles this turn */
   category: AgentCategory;
   /** Router state to carry into the next turn */
   lastCategory: AgentCategory | null;
}

export const ROUTING_BONUSES = {
   purchaseIntent: 10,
   shortReply: 15,
   affirmativeInSales: 25,
   affirmative: 15,
   courseInPurchase: 15,
} as const;

export const SHORT_REPLY_MAX_TOKENS = 2;

/** Matched as substrings, so "si" also fires inside longer words */
export const AFFIRMATIVE_TOKENS = ['si', 'sí', 'yes'] as const;

const COURSE_MENTION = 'curso';

const WeightsSchema = z.record(z.string().min(1), z.number().int().positive());

const KeywordWeightTableSchema = z
   .object({
      courses: WeightsSchema,
      career_paths: WeightsSchema,
      sales: WeightsSchema,
   })
   .strict();

/**
 * Validate a keyword table and lowercase its keys.
 * @throws ZodError when the table is malformed
 */
export function parseKeywordWeights(data: unknown): KeywordWeightTable {
   const parsed = KeywordWeightTableSchema.parse(data);

   const lowercase = (weights: Record<string, number>) =>
      Object.freeze(
         Object.fromEntries(
            Object.entries(weights).map(([keyword, weight]) => [
               keyword.toLowerCase(),
               weight,
            ])
         )
      );

   return Object.freeze({
      courses: lowercase(parsed.courses),
      career_paths: lowercase(parsed.career_paths),
      sales: lowercase(parsed.sales),
   });
}

export const DEFAULT_KEYWORD_WEIGHTS = parseKeywordWeights(keywordWeightsData);

export function emptyScores(): ScoreVector {
   return { courses: 0, career_paths: 0, sales: 0 };
}

function countTokens(message: string): number {
   return message.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Pick the highest score; ties go to the earlier category in
 * CATEGORY_PRIORITY, and an all-zero vector yields the default.
 */
export function pickWinner(scores: ScoreVector): AgentCategory {
   let winner = DEFAULT_CATEGORY;
   let best = 0;

   for (const category of CATEGORY_PRIORITY) {
      if (scores[category] > best) {
         winner = category;
         best = scores[category];
      }
   }

   return winner;
}

export class KeywordRouter {
   constructor(
      private readonly weights: KeywordWeightTable = DEFAULT_KEYWORD_WEIGHTS
   ) {}

   /**
    * Score every category for a message.
    * Pure function of (message, lastCategory, keyword table).
    */
   score(message: string, lastCategory: AgentCategory | null): ScoreVector {
      return this.explain(message, lastCategory).scores;
   }

   /**
    * Score a message and list every step that contributed points.
    */
   explain(message: string, lastCategory: AgentCategory | null): ScoreBreakdown {
      const text = message.toLowerCase();
      const scores = emptyScores();
      const contributions: ScoreContribution[] = [];

      const add = (category: AgentCategory, points: number, reason: string) => {
         scores[category] += points;
         contributions.push({ category, points, reason });
      };

      // Overlapping keywords ("curso" / "cursos") both count
      for (const category of AGENT_CATEGORIES) {
         for (const [keyword, weight] of Object.entries(this.weights[category])) {
            if (text.includes(keyword)) {
               add(category, weight, `keyword "${keyword}"`);
            }
         }
      }

      if (scores.sales > 0) {
         add('sales', ROUTING_BONUSES.purchaseIntent, 'purchase intent');
      }

      if (countTokens(text) <= SHORT_REPLY_MAX_TOKENS && lastCategory) {
         add(lastCategory, ROUTING_BONUSES.shortReply, 'short reply');
      }

      // Compounds with the short-reply bonus on one- or two-word answers
      if (AFFIRMATIVE_TOKENS.some((token) => text.includes(token))) {
         if (lastCategory === 'sales') {
            add('sales', ROUTING_BONUSES.affirmativeInSales, 'affirmative reply in sales');
         } else if (lastCategory) {
            add(lastCategory, ROUTING_BONUSES.affirmative, 'affirmative reply');
         }
      }

      if (text.includes(COURSE_MENTION) && scores.sales > 0) {
         add('sales', ROUTING_BONUSES.courseInPurchase, 'course mentioned with purchase intent');
      }

      return { scores, contributions };
   }

   /**
    * Score and select. The returned lastCategory is the winner when it
    * scored above zero, otherwise the incoming lastCategory unchanged.
    */
   select(message: string, lastCategory: AgentCategory | null): RoutingDecision {
      const { scores, contributions } = this.explain(message, lastCategory);
      const category = pickWinner(scores);

      return {
         category,
         scores,
         contributions,
         lastCategory: scores[category] > 0 ? category : lastCategory,
      };
   }
}
