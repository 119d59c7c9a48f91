/**
 * Unit Tests: Reference Resolution
 *
 * Tests uuid/promise references and label derivation including:
 * - Promise labels per element kind
 * - Resolver lookups against a live types folder
 * - Promise fallback when the types folder is missing
 *
 * @see src/changeset/references.ts
 */

import { describe, it, expect } from 'vitest';
import {
  ReferenceResolver,
  attributeDefinitionIdentifier,
  attributeDefinitionLabel,
  dataTypeLabel,
  enumValueLabel,
  formatReference,
  isReference,
  promiseRef,
  requirementTypeLabel,
  sameReference,
  uuidRef,
} from '../../src/changeset/references.js';
import { createBaselineModule, createEmptyModule, createModel } from '../fixtures/model.js';

// =============================================================================
// Labels
// =============================================================================

describe('promise labels', () => {
  it('should derive labels per element kind', () => {
    expect(dataTypeLabel('Status')).toBe('EnumerationDataTypeDefinition Status');
    expect(enumValueLabel('Status', 'Open')).toBe('EnumValue Status Open');
    expect(requirementTypeLabel('req')).toBe('RequirementType req');
    expect(attributeDefinitionLabel('AttributeDefinitionEnumeration', 'Status', 'req')).toBe(
      'AttributeDefinitionEnumeration Status req'
    );
    expect(attributeDefinitionLabel('AttributeDefinition', 'Priority', 'req')).toBe(
      'AttributeDefinition Priority req'
    );
  });

  it('should scope attribute definition identifiers by requirement type', () => {
    expect(attributeDefinitionIdentifier('Status', 'req')).toBe('Status req');
    expect(attributeDefinitionIdentifier('Status', 'bug')).toBe('Status bug');
  });
});

// =============================================================================
// Reference helpers
// =============================================================================

describe('reference helpers', () => {
  it('should recognize both reference kinds', () => {
    expect(isReference(uuidRef('abc'))).toBe(true);
    expect(isReference(promiseRef('RequirementType req'))).toBe(true);
  });

  it('should reject look-alikes', () => {
    expect(isReference({ kind: 'uuid' })).toBe(false);
    expect(isReference({ kind: 'other', uuid: 'abc' })).toBe(false);
    expect(isReference('abc')).toBe(false);
    expect(isReference(null)).toBe(false);
    expect(isReference([uuidRef('abc')])).toBe(false);
  });

  it('should compare references by kind and value', () => {
    expect(sameReference(uuidRef('a'), uuidRef('a'))).toBe(true);
    expect(sameReference(uuidRef('a'), uuidRef('b'))).toBe(false);
    expect(sameReference(uuidRef('a'), promiseRef('a'))).toBe(false);
    expect(sameReference(promiseRef('x'), promiseRef('x'))).toBe(true);
  });

  it('should format references with their tag', () => {
    expect(formatReference(uuidRef('abc'))).toBe('!uuid abc');
    expect(formatReference(promiseRef('RequirementType req'))).toBe('!promise RequirementType req');
  });
});

// =============================================================================
// ReferenceResolver
// =============================================================================

describe('ReferenceResolver', () => {
  const model = createModel(createBaselineModule());
  const mod = model.modules[0];
  const resolver = new ReferenceResolver(model, model.typesFolder(mod));

  it('should resolve existing elements to uuid references', () => {
    expect(resolver.dataType('Status')).toEqual(uuidRef('dt-status'));
    expect(resolver.enumValue('Status', 'Closed')).toEqual(uuidRef('ev-closed'));
    expect(resolver.requirementType('req')).toEqual(uuidRef('rt-req'));
    expect(resolver.attributeDefinition('AttributeDefinitionEnumeration', 'Status', 'req')).toEqual(
      uuidRef('ad-status')
    );
    expect(resolver.attributeDefinition('AttributeDefinition', 'Priority', 'req')).toEqual(
      uuidRef('ad-priority')
    );
  });

  it('should promise elements that do not exist yet', () => {
    expect(resolver.dataType('Severity')).toEqual(promiseRef('EnumerationDataTypeDefinition Severity'));
    expect(resolver.enumValue('Status', 'Rejected')).toEqual(promiseRef('EnumValue Status Rejected'));
    expect(resolver.requirementType('bug')).toEqual(promiseRef('RequirementType bug'));
  });

  it('should match attribute definitions by class', () => {
    expect(resolver.attributeDefinition('AttributeDefinition', 'Status', 'req')).toEqual(
      promiseRef('AttributeDefinition Status req')
    );
  });

  it('should promise everything without a types folder', () => {
    const empty = createModel(createEmptyModule());
    const emptyResolver = new ReferenceResolver(empty, empty.typesFolder(empty.modules[0]));
    expect(emptyResolver.dataType('Status')).toEqual(promiseRef('EnumerationDataTypeDefinition Status'));
    expect(emptyResolver.requirementType('req')).toEqual(promiseRef('RequirementType req'));
  });
});
