// tests/unit/java/java-model.test.ts
import { describe, expect, it, vi } from 'vitest';
import { JavaCodeModel } from '../../../src/java/java-model.js';
import { MemorySourceStore } from '../../../src/java/source-store.js';
import type { ModelSnapshot } from '../../../src/types/model.js';
import type { CodeSymbol, MethodSymbol } from '../../../src/types/symbols.js';
import { ModelReadError, StaleSymbolError } from '../../../src/utils/errors.js';
import type { Logger } from '../../../src/utils/logger.js';

const SERVICE = [
  'package app;',
  '',
  'public class Service extends Base implements Runnable {',
  '    private final Repo repo = new Repo();',
  '',
  '    public void run() {',
  '        helper(1);',
  '        repo.save("a", 2);',
  '        Util.format("x");',
  '    }',
  '',
  '    private int helper(int n) {',
  '        return helper(n - 1);',
  '    }',
  '',
  '    void unused() {}',
  '',
  '    @Override',
  '    public String toString() { return "s"; }',
  '',
  '    protected void hook() {}',
  '}',
  '',
].join('\n');

function project(): Record<string, string> {
  return {
    'src/Service.java': SERVICE,
    'src/Base.java': 'package app;\n\npublic abstract class Base {\n    protected void hook() {}\n}\n',
    'src/Repo.java':
      'package app;\n\npublic class Repo {\n    void save(String key, int value) {}\n    void save(String key) {}\n}\n',
    'src/Util.java': 'package app;\n\npublic final class Util {\n    static String format(String s) { return s; }\n}\n',
  };
}

function symbol(snapshot: ModelSnapshot, identity: string): CodeSymbol {
  const found = snapshot.findSymbol(identity);
  if (!found) throw new Error(`missing ${identity}`);
  return found;
}

function method(snapshot: ModelSnapshot, identity: string): MethodSymbol {
  const found = symbol(snapshot, identity);
  if (found.kind !== 'method') throw new Error(`${identity} is not a method`);
  return found;
}

const RUN = 'method:src/Service.java#app.Service.run()';
const HELPER = 'method:src/Service.java#app.Service.helper(int)';

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('JavaSnapshot', () => {
  it('lists files and their symbols', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    expect(snapshot.listFiles()).toEqual(['src/Base.java', 'src/Repo.java', 'src/Service.java', 'src/Util.java']);
    const symbols = snapshot.getSymbols('src/Service.java');
    expect(symbols.packageName).toBe('app');
    expect(symbols.classes.map((c) => c.qualifiedName)).toEqual(['app.Service']);
    expect(symbols.methods.map((m) => m.name)).toEqual(['run', 'helper', 'unused', 'toString', 'hook']);
    expect(symbols.fields.map((f) => f.identity)).toEqual(['field:src/Service.java#app.Service.repo']);
  });

  it('returns empty symbols for an unknown file', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    expect(snapshot.getSymbols('src/Nope.java').methods).toEqual([]);
  });

  it('finds method references, including recursive ones', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    const refs = snapshot.findReferences(symbol(snapshot, HELPER));
    expect(refs.map((r) => r.referencingMethod)).toEqual([RUN, HELPER]);
    expect(refs[0]).toMatchObject({ file: 'src/Service.java', line: 7, column: 9 });
  });

  it('matches overloads by argument count', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    expect(snapshot.findReferences(symbol(snapshot, 'method:src/Repo.java#app.Repo.save(String,int)'))).toHaveLength(1);
    expect(snapshot.findReferences(symbol(snapshot, 'method:src/Repo.java#app.Repo.save(String)'))).toHaveLength(0);
  });

  it('finds field and class references', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    const fieldRefs = snapshot.findReferences(symbol(snapshot, 'field:src/Service.java#app.Service.repo'));
    expect(fieldRefs.map((r) => r.referencingMethod)).toEqual([RUN]);
    expect(snapshot.findReferences(symbol(snapshot, 'class:src/Repo.java#app.Repo'))).toHaveLength(2);
  });

  it('lists the call expressions in a method body', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    const calls = snapshot.callExpressionsIn(method(snapshot, RUN));
    expect(calls.map(({ name, qualifier, argumentCount }) => ({ name, qualifier, argumentCount }))).toEqual([
      { name: 'helper', qualifier: null, argumentCount: 1 },
      { name: 'save', qualifier: 'repo', argumentCount: 2 },
      { name: 'format', qualifier: 'Util', argumentCount: 1 },
    ]);
  });

  it('resolves call targets through scope, receiver type and project-wide uniqueness', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    const targets = snapshot
      .callExpressionsIn(method(snapshot, RUN))
      .map((call) => snapshot.resolveCallTarget(call)?.identity ?? null);
    expect(targets).toEqual([
      HELPER,
      'method:src/Repo.java#app.Repo.save(String,int)',
      'method:src/Util.java#app.Util.format(String)',
    ]);
  });

  it('treats methods of types with external supertypes as overrides by default', async () => {
    const snapshot = await new JavaCodeModel(new MemorySourceStore(project())).readSnapshot();
    const overrides = snapshot.getSymbols('src/Service.java').methods.map((m) => [m.name, m.overrides]);
    expect(overrides).toEqual([
      ['run', true],
      ['helper', false],
      ['unused', true],
      ['toString', true],
      ['hook', true],
    ]);
  });

  it('only uses project supertypes when external supertypes are not trusted', async () => {
    const model = new JavaCodeModel(new MemorySourceStore(project()), { externalSupertypesAreOverrides: false });
    const snapshot = await model.readSnapshot();
    const overrides = snapshot.getSymbols('src/Service.java').methods.map((m) => [m.name, m.overrides]);
    expect(overrides).toEqual([
      ['run', false],
      ['helper', false],
      ['unused', false],
      ['toString', true],
      ['hook', true],
    ]);
  });

  it('marks interface methods as implicitly public and abstract', async () => {
    const store = new MemorySourceStore({ 'Api.java': 'interface Api { void call(); default void ping() {} }' });
    const snapshot = await new JavaCodeModel(store).readSnapshot();
    const [call, ping] = snapshot.getSymbols('Api.java').methods;
    expect(call).toMatchObject({ modifiers: ['public', 'abstract'], declaredInInterface: true });
    expect(ping.modifiers).toEqual(['default', 'public']);
  });

  it('counts names in unparseable files as references', async () => {
    const logger = fakeLogger();
    const store = new MemorySourceStore({
      'A.java': 'class A { void target() {} }',
      'B.java': 'class B { void m() { target(); } void broken( }',
    });
    const snapshot = await new JavaCodeModel(store, { logger }).readSnapshot();
    expect(snapshot.getSymbols('B.java').methods).toEqual([]);
    const refs = snapshot.findReferences(symbol(snapshot, 'method:A.java#A.target()'));
    expect(refs).toEqual([{ target: 'method:A.java#A.target()', file: 'B.java', line: 1, column: 22, referencingMethod: null }]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('reads no declarations from a file with an unterminated string', async () => {
    const logger = fakeLogger();
    const store = new MemorySourceStore({ 'C.java': 'class C { String s = "abc; }' });
    const snapshot = await new JavaCodeModel(store, { logger }).readSnapshot();
    expect(snapshot.getSymbols('C.java').classes).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects with ModelReadError when the sources cannot be listed', async () => {
    const store = new MemorySourceStore({});
    vi.spyOn(store, 'list').mockImplementation(() => {
      throw new Error('EACCES');
    });
    const model = new JavaCodeModel(store);
    await expect(model.readSnapshot()).rejects.toThrow(ModelReadError);
    await expect(model.readSnapshot()).rejects.toThrow('Cannot list sources under <memory>: EACCES');
  });
});

describe('JavaCodeModel.delete', () => {
  it('removes the declaration and tidies the blank lines around it', async () => {
    const store = new MemorySourceStore(project());
    const model = new JavaCodeModel(store);
    const snapshot = await model.readSnapshot();
    await model.delete(symbol(snapshot, HELPER));

    const updated = store.read('src/Service.java');
    expect(updated).not.toContain('helper(int n)');
    expect(updated).toContain('        Util.format("x");\n    }\n\n    void unused() {}\n');
  });

  it('throws StaleSymbolError when the symbol is already gone', async () => {
    const store = new MemorySourceStore(project());
    const model = new JavaCodeModel(store);
    const snapshot = await model.readSnapshot();
    const helper = symbol(snapshot, HELPER);
    await model.delete(helper);
    await expect(model.delete(helper)).rejects.toThrow(StaleSymbolError);
  });

  it('throws StaleSymbolError when the file no longer exists', async () => {
    const files = project();
    const snapshot = await new JavaCodeModel(new MemorySourceStore(files)).readSnapshot();
    delete files['src/Service.java'];
    const model = new JavaCodeModel(new MemorySourceStore(files));
    await expect(model.delete(symbol(snapshot, HELPER))).rejects.toThrow('no longer exists');
  });
});
