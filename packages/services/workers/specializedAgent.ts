// ============================================
// SpecializedAgent
// One conversational agent: an instruction template plus a text generator
// ============================================

import type { AgentCategory } from '../shared/agent-categories';
import type { ChatPrompt, TextGenerator } from '../shared/llm-client';
import {
   AGENT_PROMPTS,
   EMPTY_HISTORY_PLACEHOLDER,
   renderPrompt,
   type PromptVariables,
} from '../shared/prompts';

export interface Agent {
   readonly category: AgentCategory;
   respond(variables: PromptVariables): Promise<string>;
}

export class SpecializedAgent implements Agent {
   constructor(
      readonly category: AgentCategory,
      private readonly template: string,
      private readonly generator: TextGenerator
   ) {}

   /**
    * Instructions, catalogue, context and history go in the system
    * message; the raw query is the user message.
    */
   buildPrompt(variables: PromptVariables): ChatPrompt {
      return {
         system: renderPrompt(this.template, {
            knowledgeSnippet: variables.knowledgeSnippet,
            context: variables.context,
            courseDetails: variables.courseDetails,
            history: variables.history || EMPTY_HISTORY_PLACEHOLDER,
         }),
         user: variables.query,
      };
   }

   async respond(variables: PromptVariables): Promise<string> {
      const text = await this.generator.generate(this.buildPrompt(variables));
      return text.trim();
   }
}

export type AgentRegistry = Record<AgentCategory, Agent>;

/**
 * Build the three agents over one shared generator
 */
export function createAgents(generator: TextGenerator): AgentRegistry {
   return {
      courses: new SpecializedAgent('courses', AGENT_PROMPTS.courses, generator),
      career_paths: new SpecializedAgent(
         'career_paths',
         AGENT_PROMPTS.career_paths,
         generator
      ),
      sales: new SpecializedAgent('sales', AGENT_PROMPTS.sales, generator),
   };
}
