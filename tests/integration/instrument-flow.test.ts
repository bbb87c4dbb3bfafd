import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { applyPlan } from '../../src/core/applier.js';
import { generatePlan, inspectLayout } from '../../src/core/generators/index.js';
import { resolveRequestedMode } from '../../src/core/mode.js';
import { scanDirectory } from '../../src/core/scanner.js';
import { RequestAlreadySatisfiedError } from '../../src/utils/errors.js';
import { createTempRepo, removeTempRepo } from '../unit/helpers/temp-repo.js';

const GIN_MAIN = `package main

import (
	"github.com/gin-gonic/gin"
)

func main() {
	router := gin.Default()
	router.GET("/ping", func(c *gin.Context) { c.String(200, "pong") })
	router.Run()
}
`;

const FLASK_APP = `from flask import Flask

app = Flask(__name__)


@app.route("/")
def index():
    return "ok"
`;

const SPRING_POM = `<project>
    <dependencies>
        <dependency>
            <groupId>org.springframework.boot</groupId>
            <artifactId>spring-boot-starter-web</artifactId>
        </dependency>
    </dependencies>
</project>
`;

const SPRING_APP = `package com.acme.shop;

import org.springframework.boot.SpringApplication;
import org.springframework.boot.autoconfigure.SpringBootApplication;

@SpringBootApplication
public class ShopApplication {
    public static void main(String[] args) {
        SpringApplication.run(ShopApplication.class, args);
    }
}
`;

const EXPRESS_INDEX = `const express = require('express');

const app = express();
app.get('/', (req, res) => res.send('ok'));
app.listen(3000);
`;

describe('instrumenting a service end to end', () => {
  let root: string;

  afterEach(async () => {
    await removeTempRepo(root);
  });

  it('should add metrics and tracing to a Gin service', async () => {
    root = await createTempRepo({
      'go.mod': 'module example.com/shop\n\ngo 1.21\n\nrequire github.com/gin-gonic/gin v1.9.1\n',
      'main.go': GIN_MAIN,
    });

    const before = await scanDirectory(root);
    expect(before.frameworks).toEqual([
      { language: 'go', framework: 'Gin', hasMetrics: false, hasTracing: false, serviceName: 'go-service' },
    ]);

    const [detection] = before.frameworks;
    const mode = resolveRequestedMode(detection, 'both');
    const plan = generatePlan('go', 'shop', mode, before.candidates, { framework: detection.framework });
    const applied = await applyPlan(root, plan);

    expect(applied.created).toEqual(['metrics/metrics.go', 'otel_tracing.go']);
    expect(applied.modified).toEqual(['go.mod', 'main.go']);
    expect(await readFile(join(root, 'main.go'), 'utf-8')).toBe(`package main

import (
	"go.opentelemetry.io/contrib/instrumentation/github.com/gin-gonic/gin/otelgin"
	"github.com/prometheus/client_golang/prometheus/promhttp"
	"github.com/gin-gonic/gin"
)

func main() {
	router := gin.Default()
	shutdownTracing := setupTracing()
	defer shutdownTracing()
	router.Use(otelgin.Middleware("shop"))
	// Prometheus exposition endpoint
	router.GET("/metrics", gin.WrapH(promhttp.Handler()))
	router.GET("/ping", func(c *gin.Context) { c.String(200, "pong") })
	router.Run()
}
`);

    const after = await scanDirectory(root);
    expect(after.frameworks[0]).toMatchObject({ hasMetrics: true, hasTracing: true });
    expect(after.candidates.map((c) => [c.kind, c.files])).toEqual([
      ['metrics', ['main.go', 'metrics/metrics.go']],
      ['tracing', ['main.go', 'otel_tracing.go']],
    ]);
    expect(() => resolveRequestedMode(after.frameworks[0], 'both')).toThrow(RequestAlreadySatisfiedError);
  });

  it('should leave an instrumented tree unchanged when the plan is applied again', async () => {
    root = await createTempRepo({
      'go.mod': 'module example.com/shop\n\nrequire github.com/gin-gonic/gin v1.9.1\n',
      'main.go': GIN_MAIN,
    });
    const plan = generatePlan('go', 'shop', 'both', [], { framework: 'Gin' });

    await applyPlan(root, plan);
    const again = await applyPlan(root, plan);

    expect(again.edits.every((edit) => edit.outcome === 'unchanged')).toBe(true);
    expect(again.created).toEqual([]);
    expect(again.modified).toEqual([]);
  });

  it('should add metrics and tracing to an Express service', async () => {
    root = await createTempRepo({
      'package.json': '{\n  "name": "web",\n  "dependencies": {\n    "express": "^4.19.0"\n  }\n}\n',
      'index.js': EXPRESS_INDEX,
    });

    const before = await scanDirectory(root);
    const [detection] = before.frameworks;
    expect(detection).toMatchObject({ language: 'nodejs', framework: 'Express', hasMetrics: false });

    const plan = generatePlan('nodejs', 'web', resolveRequestedMode(detection, 'both'), before.candidates);
    await applyPlan(root, plan);

    expect(await readFile(join(root, 'index.js'), 'utf-8')).toBe(`const express = require('express');

const app = express();
const { startTracing } = require('./tracing.js');
startTracing();
const { metricsMiddleware, metricsHandler } = require('./metrics.js');
app.use(metricsMiddleware);
app.get('/metrics', metricsHandler);
app.get('/', (req, res) => res.send('ok'));
app.listen(3000);
`);
    const pkg: unknown = JSON.parse(await readFile(join(root, 'package.json'), 'utf-8'));
    expect(pkg).toMatchObject({
      dependencies: {
        express: '^4.19.0',
        'prom-client': '^15.1.0',
        '@opentelemetry/sdk-node': '^0.52.0',
      },
    });

    const after = await scanDirectory(root);
    expect(after.frameworks[0]).toMatchObject({ hasMetrics: true, hasTracing: true });
    expect(after.candidates.map((c) => [c.kind, c.files])).toEqual([
      ['metrics', ['metrics.js']],
      ['tracing', ['tracing.js']],
    ]);
  });

  it('should add metrics and tracing to a Flask service', async () => {
    root = await createTempRepo({ 'requirements.txt': 'flask==3.0.0\n', 'app.py': FLASK_APP });

    const before = await scanDirectory(root);
    const [detection] = before.frameworks;
    expect(detection).toMatchObject({ language: 'python', framework: 'Flask', hasMetrics: false, hasTracing: false });

    const plan = generatePlan('python', 'shop', resolveRequestedMode(detection, 'both'), before.candidates, {
      framework: detection.framework,
      layout: await inspectLayout(root),
    });
    await applyPlan(root, plan);

    expect(await readFile(join(root, 'app.py'), 'utf-8')).toBe(`from flask import Flask

app = Flask(__name__)
from otel_config import init_tracer
init_tracer(app)
from metrics_config import setup_metrics
setup_metrics(app)


@app.route("/")
def index():
    return "ok"
`);
    expect(await readFile(join(root, 'requirements.txt'), 'utf-8')).toBe(
      [
        'flask==3.0.0',
        'prometheus-client>=0.19.0',
        'opentelemetry-api>=1.20.0',
        'opentelemetry-sdk>=1.20.0',
        'opentelemetry-exporter-otlp-proto-grpc>=1.20.0',
        'opentelemetry-instrumentation-flask>=0.41b0',
        '',
      ].join('\n'),
    );

    const after = await scanDirectory(root);
    expect(after.frameworks[0]).toMatchObject({ hasMetrics: true, hasTracing: true });
    expect(after.candidates.map((c) => [c.kind, c.files])).toEqual([
      ['metrics', ['metrics_config.py']],
      ['tracing', ['otel_config.py']],
    ]);
  });

  it('should add metrics and tracing to a Spring Boot service', async () => {
    root = await createTempRepo({
      'pom.xml': SPRING_POM,
      'src/main/java/com/acme/shop/ShopApplication.java': SPRING_APP,
      'src/main/resources/application.properties': 'spring.application.name=shop\n',
    });

    const before = await scanDirectory(root);
    const [detection] = before.frameworks;
    expect(detection).toMatchObject({ language: 'java', framework: 'Spring Boot', hasMetrics: false, hasTracing: false });

    const plan = generatePlan('java', 'shop', 'both', before.candidates, { layout: await inspectLayout(root) });
    const applied = await applyPlan(root, plan);

    expect(applied.edits.map((edit) => edit.outcome)).toEqual([
      'inserted',
      'created',
      'created',
      'inserted',
      'inserted',
      'created',
      'created',
      'inserted',
    ]);
    expect(await readFile(join(root, 'src/main/resources/application.properties'), 'utf-8')).toBe(
      [
        'spring.application.name=shop',
        'spring.config.import[1]=optional:classpath:application-otel.properties',
        'spring.config.import[0]=optional:classpath:application-metrics.properties',
        '',
      ].join('\n'),
    );

    const after = await scanDirectory(root);
    expect(after.frameworks[0]).toMatchObject({ hasMetrics: true, hasTracing: true });
    expect(after.candidates.map((c) => [c.kind, c.files])).toEqual([
      ['metrics', ['src/main/java/com/acme/shop/observability/HttpMetricsFilter.java']],
      ['tracing', ['src/main/java/com/acme/shop/observability/OpenTelemetryConfig.java']],
    ]);
    expect(() => resolveRequestedMode(after.frameworks[0], 'both')).toThrow(RequestAlreadySatisfiedError);
  });

  it('should instrument a Go module that lives below the repository root', async () => {
    root = await createTempRepo({
      'backend/go.mod': 'module example.com/shop\n\ngo 1.21\n',
      'backend/main.go': 'package main\n\nimport (\n\t"net/http"\n)\n\nfunc main() {\n\thttp.ListenAndServe(":8080", nil)\n}\n',
    });

    const before = await scanDirectory(root);
    const plan = generatePlan('go', 'shop', 'metrics', before.candidates, { layout: await inspectLayout(root) });
    const applied = await applyPlan(root, plan);

    expect(applied.created).toEqual(['backend/metrics/metrics.go']);
    expect(applied.modified).toEqual(['backend/go.mod', 'backend/main.go']);
    expect(await readFile(join(root, 'backend/go.mod'), 'utf-8')).toBe(
      'module example.com/shop\n\ngo 1.21\nrequire github.com/prometheus/client_golang v1.19.1\n',
    );
    const after = await scanDirectory(root);
    expect(after.frameworks[0]).toMatchObject({ language: 'go', hasMetrics: true, hasTracing: false });
  });

  it('should give a package.json without dependencies a valid block', async () => {
    root = await createTempRepo({
      'package.json': '{\n  "name": "web",\n  "version": "1.0.0"\n}\n',
      'index.js': EXPRESS_INDEX,
    });

    const plan = generatePlan('nodejs', 'web', 'both', [], { layout: await inspectLayout(root) });
    await applyPlan(root, plan);

    const pkg: unknown = JSON.parse(await readFile(join(root, 'package.json'), 'utf-8'));
    expect(pkg).toEqual({
      name: 'web',
      version: '1.0.0',
      dependencies: {
        '@opentelemetry/auto-instrumentations-node': '^0.47.0',
        '@opentelemetry/exporter-trace-otlp-grpc': '^0.52.0',
        '@opentelemetry/resources': '^1.25.0',
        '@opentelemetry/sdk-node': '^0.52.0',
        '@opentelemetry/semantic-conventions': '^1.25.0',
        'prom-client': '^15.1.0',
      },
    });

    const replanned = generatePlan('nodejs', 'web', 'both', [], { layout: await inspectLayout(root) });
    expect(replanned.edits.some((edit) => edit.path === 'package.json')).toBe(false);
    const again = await applyPlan(root, replanned);
    expect(again.edits.every((edit) => edit.outcome === 'unchanged')).toBe(true);
  });
});
