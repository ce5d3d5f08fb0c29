import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { DEFAULT_DEVICE_CONFIG } from '../config-decoder.js';
import { TYPE_INT_COLOR_ARGB8, TYPE_STRING } from '../constants/chunk-types.js';
import { TableStateError } from '../errors.js';
import { ResourceTable } from '../resource-table.js';
import { ResourceConfiguration, ResourcePackage, ResourceType } from '../table-model.js';
import type { Resource } from '../types/resource.js';
import { silentLogger } from '../utils/logger.js';
import { buildTable, packageChunk, typeChunk, typeSpecChunk } from './support/table-builder.js';

const quiet = { strict: true, logger: silentLogger };

function stringResource(resourceName: string, value: string, resourceId: number): Resource {
  return { kind: 'string', value, resourceName, resourceId };
}

function baseTable(): ResourceTable {
  return ResourceTable.fromBuffer({
    options: quiet,
    data: buildTable({
      strings: ['Example App'],
      packages: [packageChunk({
        id: 0x7f,
        name: 'com.example.app',
        typeStrings: ['string'],
        keyStrings: ['app_name'],
        chunks: [typeSpecChunk({ id: 1 }), typeChunk({ id: 1, entries: [{ index: 0, key: 0, value: { dataType: TYPE_STRING, data: 0 } }] })],
      })],
    }),
  });
}

function overlayTable(): ResourceTable {
  return ResourceTable.fromBuffer({
    options: quiet,
    data: buildTable({
      strings: ['Beispiel', 'Zweite'],
      packages: [
        packageChunk({
          id: 0x7f,
          name: 'com.example.app',
          typeStrings: ['string', 'color'],
          keyStrings: ['app_name', 'title', 'accent'],
          chunks: [
            typeSpecChunk({ id: 1 }),
            typeChunk({ id: 1, entries: [{ index: 1, key: 1, value: { dataType: TYPE_STRING, data: 1 } }] }),
            typeChunk({ id: 1, config: { language: 'de' }, entries: [{ index: 0, key: 0, value: { dataType: TYPE_STRING, data: 0 } }] }),
            typeSpecChunk({ id: 2 }),
            typeChunk({ id: 2, entries: [{ index: 0, key: 2, value: { dataType: TYPE_INT_COLOR_ARGB8, data: 0xff000000 } }] }),
          ],
        }),
        packageChunk({ id: 0x7f, name: 'com.example.feature', typeStrings: [], keyStrings: [], chunks: [] }),
      ],
    }),
  });
}

describe('ResourceTable.addAll', () => {
  it('merges matching packages and appends the rest', () => {
    const table = baseTable();
    table.addAll(overlayTable());
    assert.deepEqual(table.getPackages().map((resPackage) => resPackage.name), ['com.example.app', 'com.example.feature']);
    const app = table.getPackage(0x7f, 'com.example.app');
    assert.ok(app);
    assert.deepEqual(app.types.map((type) => type.name), ['string', 'color']);
  });

  it('concatenates equal configurations and adds new ones', () => {
    const table = baseTable();
    table.addAll(overlayTable());
    const strings = table.findResourceType(0x7f010000);
    assert.ok(strings);
    assert.equal(strings.configurations.length, 2);
    assert.deepEqual(strings.configurations[0].resources.map((resource) => resource.resourceName), ['app_name', 'title']);
    assert.deepEqual(table.findAllResources(0x7f010000).map((resource) => resource.kind === 'string' ? resource.value : null), ['Example App', 'Beispiel']);
  });

  it('overwrites global strings at the same ordinal', () => {
    const table = baseTable();
    table.addAll(overlayTable());
    assert.deepEqual(Array.from(table.getGlobalStringPool().entries()), [[0, 'Beispiel'], [1, 'Zweite']]);
  });

  it('copies what it appends', () => {
    const table = baseTable();
    const overlay = overlayTable();
    table.addAll(overlay);
    const overlayColors = overlay.findResourceType(0x7f020000);
    assert.ok(overlayColors);
    overlayColors.configurations[0].resources.length = 0;
    assert.equal(table.findResource(0x7f020000)?.resourceName, 'accent');
  });

  it('keeps ids of both tables when their package ids differ', () => {
    const table = baseTable();
    const framework = ResourceTable.fromBuffer({
      options: quiet,
      data: buildTable({
        packages: [packageChunk({
          id: 0x01,
          name: 'android',
          typeStrings: ['color'],
          keyStrings: ['black'],
          chunks: [typeSpecChunk({ id: 1 }), typeChunk({ id: 1, entries: [{ index: 0, key: 0, value: { dataType: TYPE_INT_COLOR_ARGB8, data: 0xff000000 } }] })],
        })],
      }),
    });
    const before: Resource | null = table.findResource(0x7f010000);
    table.addAll(framework);
    assert.deepEqual(table.getPackages().map((resPackage) => [resPackage.id, resPackage.name]), [[0x7f, 'com.example.app'], [0x01, 'android']]);
    assert.deepEqual(table.findResource(0x7f010000), before);
    assert.deepEqual(table.findResource(0x01010000), framework.findResource(0x01010000));
    assert.equal(table.findResource(0x01010000)?.resourceName, 'black');
  });

  it('requires both tables to be parsed', () => {
    assert.throws(() => baseTable().addAll(new ResourceTable(quiet)), TableStateError);
    assert.throws(() => new ResourceTable(quiet).addAll(baseTable()), TableStateError);
  });
});

describe('resource model', () => {
  it('returns each resource name once across configurations', () => {
    const type = new ResourceType(1, 'string');
    type.getOrAddConfiguration(DEFAULT_DEVICE_CONFIG).resources.push(stringResource('title', 'Title', 0x7f010000));
    type.getOrAddConfiguration({ ...DEFAULT_DEVICE_CONFIG, language: 'fr' }).resources.push(
      stringResource('title', 'Titre', 0x7f010000),
      stringResource('subtitle', 'Sous-titre', 0x7f010001),
    );
    assert.deepEqual(type.getAllResources().map((resource) => resource.kind === 'string' ? resource.value : null), ['Title', 'Sous-titre']);
    assert.equal(type.getFirstResource('subtitle')?.resourceId, 0x7f010001);
    assert.equal(type.getFirstResource(0x7f010000)?.resourceName, 'title');
    assert.equal(type.getFirstResource('unknown'), null);
    assert.equal(String(type), 'string');
  });

  it('reuses configurations with equal settings', () => {
    const type = new ResourceType(1, 'string');
    const first: ResourceConfiguration = type.getOrAddConfiguration({ ...DEFAULT_DEVICE_CONFIG });
    assert.equal(type.getOrAddConfiguration({ ...DEFAULT_DEVICE_CONFIG }), first);
    assert.equal(type.configurations.length, 1);
  });

  it('matches types on id and name', () => {
    const resPackage = new ResourcePackage(0x7f, 'com.example.app');
    const strings = resPackage.getOrAddType(1, 'string');
    assert.equal(resPackage.getOrAddType(1, 'string'), strings);
    assert.notEqual(resPackage.getOrAddType(1, 'other'), strings);
    assert.equal(resPackage.getTypeById(1), strings);
    assert.equal(resPackage.getType(2, 'string'), null);
  });

  it('clones deeply enough to keep resource lists apart', () => {
    const resPackage = new ResourcePackage(0x7f, 'com.example.app');
    resPackage.getOrAddType(1, 'string').getOrAddConfiguration(DEFAULT_DEVICE_CONFIG).resources.push(stringResource('title', 'Title', 0x7f010000));
    const copy = resPackage.clone();
    copy.types[0].configurations[0].resources.push(stringResource('extra', 'Extra', 0x7f010001));
    assert.equal(resPackage.types[0].configurations[0].resources.length, 1);
    assert.equal(copy.types[0].configurations[0].resources.length, 2);
  });
});
