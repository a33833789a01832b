import { DockerExecutionHost, ExecutionEngine } from '../src';

async function main() {
  const host = await DockerExecutionHost.open({ image: 'python:3.12-slim' });
  const engine = await ExecutionEngine.create(host, { installPolicy: 'pip', verbosity: 'debug' });

  try {
    const session = await engine.createSession();

    const output = await engine.executeCode(
      session.id,
      `
numbers = [1, 2, 3, 4, 5]
total = sum(numbers)
print('Numbers:', numbers)
print('Sum:', total)
print('Average:', total / len(numbers))
`
    );
    console.log('Execution Result:');
    console.log(output);

    // Rejected before anything reaches the container
    console.log(await engine.executeCode(session.id, 'import subprocess\nsubprocess.run(["ls"])'));
  } finally {
    await engine.shutdown();
    await host.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exitCode = 1;
});
