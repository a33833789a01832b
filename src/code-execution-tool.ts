import { z } from 'zod';
import { ExecutionEngine } from './execution-engine';

export const codeExecutionSchema = z.object({
  code: z.string().describe('The Python code to execute.'),
  sessionId: z
    .string()
    .optional()
    .describe('Id of an existing session to run in. Without it a temporary session is used and closed afterwards.'),
  ignoreDependencies: z
    .array(z.string())
    .optional()
    .describe('Imported packages that should not be installed before running.'),
  ignoreUnsafeFunctions: z
    .array(z.string())
    .optional()
    .describe('Function names to allow despite being considered unsafe.')
});

export type CodeExecutionInput = z.infer<typeof codeExecutionSchema>;

export interface CodeExecutionResult {
  output: string;
  sessionId: string;
}

export function createCodeExecutionTool(engine: ExecutionEngine) {
  return {
    description:
      'Executes Python code in an isolated sandbox. Imported third-party packages are installed for the run and removed afterwards.',
    parameters: codeExecutionSchema,
    execute: async ({
      code,
      sessionId,
      ignoreDependencies,
      ignoreUnsafeFunctions
    }: CodeExecutionInput): Promise<CodeExecutionResult> => {
      if (sessionId) {
        const output = await engine.executeCode(sessionId, code, { ignoreDependencies, ignoreUnsafeFunctions });
        return { output, sessionId };
      }

      const session = await engine.createSession();
      try {
        const output = await engine.executeCode(session.id, code, { ignoreDependencies, ignoreUnsafeFunctions });
        return { output, sessionId: session.id };
      } finally {
        await engine.closeSession(session.id);
      }
    }
  };
}
