import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ModelManager } from '../avatar/ModelManager';
import { ExpressionService, extractParameterMap } from '../services/ExpressionService';
import { SettingsService } from '../services/SettingsService';
import { fakeModel, makeTempDir, withArity } from './fixtures/fakeModel';

function setup() {
  const dir = makeTempDir();
  fs.writeFileSync(
    path.join(dir, 'expressions.json'),
    JSON.stringify({ wink: { ParamEyeLOpen: 0, note: 'flat map' }, empty: { parameters: {} } })
  );
  const settings = new SettingsService(dir);
  const { model, calls } = fakeModel({ SetParameterValue: withArity(3) });
  const manager = new ModelManager(() => model);
  manager.attachModel(model, null);
  return { dir, settings, manager, calls, service: new ExpressionService(settings, manager) };
}

describe('ExpressionService', () => {
  it('reads both preset shapes', () => {
    expect(extractParameterMap({ parameters: { A: 1, B: 'x' }, C: 2 })).toEqual({ A: 1 });
    expect(extractParameterMap({ A: 1, description: 'flat' })).toEqual({ A: 1 });
    expect(extractParameterMap('nope')).toEqual({});
  });

  it('lists stored presets merged over the defaults', () => {
    const { service } = setup();
    expect(service.listExpressions()).toEqual(['neutral', 'happy', 'sad', 'angry', 'excited', 'wink', 'empty']);
  });

  it('applies flat presets and rejects unknown or empty ones', () => {
    const { service, calls } = setup();
    expect(service.applyExpression('wink', { blend: 0.7 })).toBe(true);
    expect(calls).toEqual([{ name: 'SetParameterValue', args: ['ParamEyeLOpen', 0, 0.7] }]);
    expect(service.applyExpression('missing')).toBe(false);
    expect(service.applyExpression('empty')).toBe(false);
  });

  it('does nothing without a model', () => {
    const { service } = setup();
    service.setModel(null);
    expect(service.applyExpression('wink')).toBe(false);
    expect(service.applySnapshot({ ParamA: 1 })).toBe(false);
  });

  it('picks up edits on reload', () => {
    const { service, settings } = setup();
    settings.saveExpressions({ shy: { parameters: { ParamCheek: 1 } } });
    expect(service.getExpression('shy')).toBeUndefined();
    service.reload();
    expect(service.getExpression('shy')).toEqual({ parameters: { ParamCheek: 1 } });
  });
});
