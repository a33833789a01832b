import * as fs from 'fs';
import * as path from 'path';
import { DockerExecutionHost, ExecutionEngine, loadDockerHostConfigFromEnv } from '../src';

// Expects SANDBOX_DOCKER_IMAGE or SANDBOX_DOCKER_CONTAINER to be set
async function main() {
  const host = await DockerExecutionHost.open(loadDockerHostConfigFromEnv());
  const engine = await ExecutionEngine.create(host, {
    dependencyWhitelist: ['pandas'],
    installPolicy: 'pip'
  });

  try {
    const { id } = await engine.createSession();
    await engine.uploadFile(id, 'sales.csv', Buffer.from('region,amount\nnorth,120\nsouth,80\nnorth,45\n'));

    const output = await engine.executeCode(
      id,
      `
import pandas as pd

df = pd.read_csv('src/sales.csv')
summary = df.groupby('region')['amount'].sum()
summary.to_csv('artifacts/summary.csv')
print(summary)
`
    );
    console.log(output);

    console.log('Artifacts:', await engine.listArtifacts(id));
    const summary = await engine.downloadFile(id, 'summary.csv');
    console.log(summary.toString('utf-8'));

    const archivePath = path.join(process.cwd(), `artifacts-${id}.zip`);
    fs.writeFileSync(archivePath, await engine.archiveArtifacts(id));
    console.log(`Saved ${archivePath}`);
  } finally {
    await engine.shutdown();
    await host.close();
  }
}

main().catch(error => {
  console.error('Error:', error);
  process.exitCode = 1;
});
