import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { checkTransfers } from './core/artifact-transfer.js';
import { formatValidationErrors, loadPipeline } from './core/pipeline-loader.js';
import { planPipeline } from './core/plan.js';
import type { PipelineDefinition } from './types/pipeline.js';

function loadExample(name: string): PipelineDefinition {
  const path = fileURLToPath(new URL(`../examples/${name}/pipeline.yaml`, import.meta.url));
  const result = loadPipeline(path);
  if (!result.ok) throw new Error(formatValidationErrors(result.errors));
  return result.pipeline;
}

describe('example pipelines', () => {
  it('web builds a site and serves it statically', () => {
    const pipeline = loadExample('web');

    checkTransfers(pipeline);
    expect(planPipeline(pipeline).map((step) => step.stage.name)).toEqual(['build', 'serve']);
    expect(pipeline.stages[1].launch).toMatchObject({ variant: 'static', documentRoot: '/usr/share/nginx/html' });
    expect(pipeline.stages[1].ports).toEqual([{ hostPort: 8080, containerPort: 80 }]);
  });

  it('api installs its requirements and runs the ASGI server', () => {
    const pipeline = loadExample('api');

    checkTransfers(pipeline);
    expect(planPipeline(pipeline).map((step) => step.stage.name)).toEqual(['serve']);
    expect(pipeline.stages[0]).toMatchObject({
      image: 'python:3.12',
      commands: ['pip install --no-cache-dir -r requirements.txt'],
      ports: [{ hostPort: 8000, containerPort: 8000 }],
    });
    expect(pipeline.stages[0].launch).toMatchObject({
      variant: 'process',
      command: ['uvicorn', 'main:app', '--host', '0.0.0.0', '--port', '8000'],
      gracePeriodMs: 5000,
    });
  });
});
