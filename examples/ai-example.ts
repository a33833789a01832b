import { generateText } from 'ai';
import { openai } from '@ai-sdk/openai';
import { createCodeExecutionTool, DockerExecutionHost, ExecutionEngine, loadConfigFromEnv } from '../src';

async function main() {
  const host = await DockerExecutionHost.open({ image: 'python:3.12-slim' });
  const engine = await ExecutionEngine.create(host, { ...loadConfigFromEnv(), installPolicy: 'pip' });
  const codeExecutionTool = createCodeExecutionTool(engine);

  try {
    const result = await generateText({
      model: openai('gpt-4o'),
      maxSteps: 10,
      messages: [
        {
          role: 'user',
          content:
            'Write a Python function to calculate the Fibonacci sequence up to n numbers and print the result. Make sure to include a test case that prints the first 10 numbers. Call the tool to execute it and print the result.'
        }
      ],
      tools: { codeExecutionTool },
      toolChoice: 'auto'
    });

    console.log('AI Response:', result.text);
    console.log('AI Tool Results:', result.toolResults);
  } finally {
    await engine.shutdown();
    await host.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exitCode = 1;
});
