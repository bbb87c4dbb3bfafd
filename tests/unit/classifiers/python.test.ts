import { analyzePythonSource, parsePythonImports, pythonClassifier } from '../../../src/core/classifiers/python.js';
import { createScanContext } from '../../../src/core/context.js';
import { createTempRepo, removeTempRepo } from '../helpers/temp-repo.js';

const FLASK_METRICS = `from flask import Flask
from prometheus_client import Counter, start_http_server
import prometheus_client as pc

app = Flask(__name__)
REQUESTS = Counter("requests_total", "Requests")
LATENCY = pc.Histogram("latency_seconds", "Latency")


@app.route("/")
def index():
    REQUESTS.inc()
    return "ok"

# start_http_server(8000)
`;

const TRACING = `from opentelemetry import trace
from opentelemetry.sdk.trace import TracerProvider
from opentelemetry.sdk.trace.export import BatchSpanProcessor

provider = TracerProvider()
trace.set_tracer_provider(provider)
tracer = trace.get_tracer(__name__)


def work():
    with tracer.start_as_current_span("work"):
        pass
`;

describe('parsePythonImports', () => {
  it('should bind plain, aliased and parenthesised imports', () => {
    const imports = parsePythonImports('import os.path, json as j\nfrom a.b import (c,\n    d as e)\n');
    expect([...imports.bindings]).toEqual([
      ['os', 'os'],
      ['j', 'json'],
      ['c', 'a.b.c'],
      ['e', 'a.b.d'],
    ]);
    expect(imports.modules).toEqual(['os.path', 'json', 'a.b']);
    expect(imports.starModules).toEqual([]);
  });

  it('should record star imports', () => {
    expect(parsePythonImports('from prometheus_client import *\n').starModules).toEqual(['prometheus_client']);
  });
});

describe('analyzePythonSource', () => {
  it('should resolve direct and module-qualified metric constructors', () => {
    const findings = analyzePythonSource(FLASK_METRICS);
    expect([...findings.imports]).toEqual(['metrics']);
    expect([...findings.usages.metrics].sort()).toEqual(['.inc', 'Counter', 'Histogram']);
    expect(findings.framework).toBe('Flask');
  });

  it('should ignore calls that only appear in comments', () => {
    expect(analyzePythonSource(FLASK_METRICS).usages.metrics.has('start_http_server')).toBe(false);
  });

  it('should find tracer setup and span methods', () => {
    const findings = analyzePythonSource(TRACING);
    expect([...findings.imports]).toEqual(['tracing']);
    expect([...findings.usages.tracing].sort()).toEqual(
      ['.start_as_current_span', 'TracerProvider', 'get_tracer', 'set_tracer_provider'].sort(),
    );
    expect(findings.framework).toBeUndefined();
  });

  it('should resolve names brought in by a star import', () => {
    const findings = analyzePythonSource('from prometheus_client import *\nc = Gauge("g", "g")\n');
    expect([...findings.usages.metrics]).toEqual(['Gauge']);
  });

  it('should resolve callables imported under another name', () => {
    const metrics = analyzePythonSource(
      'from prometheus_client import Counter as RequestCounter\nREQUESTS = RequestCounter("reqs", "help")\n',
    );
    expect([...metrics.usages.metrics]).toEqual(['Counter']);

    const tracing = analyzePythonSource(
      'from opentelemetry.sdk.trace import TracerProvider as TP\nprovider = TP()\n',
    );
    expect([...tracing.usages.tracing]).toEqual(['TracerProvider']);
  });

  it('should not treat same-named callables from other libraries as telemetry', () => {
    const findings = analyzePythonSource('from collections import Counter\nc = Counter()\n');
    expect(findings.imports.size).toBe(0);
    expect(findings.usages.metrics.size).toBe(0);
  });
});

describe('pythonClassifier', () => {
  it('should detect root manifests and Python sources', () => {
    expect(pythonClassifier.detect(['requirements.txt'])).toBe(true);
    expect(pythonClassifier.detect(['tools/scripts.py'])).toBe(true);
    expect(pythonClassifier.detect(['svc/requirements.txt'])).toBe(false);
  });

  it('should read the framework from manifests case-insensitively', async () => {
    const root = await createTempRepo({ 'requirements.txt': 'Flask==3.0.0\nrequests\n' });
    try {
      expect(await pythonClassifier.detectFramework(root, ['requirements.txt'])).toBe('Flask');
    } finally {
      await removeTempRepo(root);
    }
  });

  it('should prefer FastAPI when several frameworks are listed', async () => {
    const root = await createTempRepo({ 'pyproject.toml': 'dependencies = ["flask", "fastapi"]\n' });
    try {
      expect(await pythonClassifier.detectFramework(root, ['pyproject.toml'])).toBe('FastAPI');
    } finally {
      await removeTempRepo(root);
    }
  });

  it('should report the framework seen in source', async () => {
    const root = await createTempRepo({ 'app.py': FLASK_METRICS, 'otel.py': TRACING });
    try {
      const output = await pythonClassifier.classify(root, ['app.py', 'otel.py'], createScanContext());
      expect(output.files).toEqual({ metrics: ['app.py'], tracing: ['otel.py'] });
      expect(output.patterns.metrics).toEqual(['Counter', 'Histogram', '.inc']);
      expect(output.sourceFramework).toBe('Flask');
    } finally {
      await removeTempRepo(root);
    }
  });

  it('should list a file whose only usage goes through a renamed import', async () => {
    const root = await createTempRepo({
      'metrics.py': 'from prometheus_client import Counter as RequestCounter\nREQUESTS = RequestCounter("reqs", "help")\n',
    });
    try {
      const output = await pythonClassifier.classify(root, ['metrics.py'], createScanContext());
      expect(output.files.metrics).toEqual(['metrics.py']);
      expect(output.patterns.metrics).toEqual(['Counter']);
    } finally {
      await removeTempRepo(root);
    }
  });
});
