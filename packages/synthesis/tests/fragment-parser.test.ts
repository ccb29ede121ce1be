import { parseFragment } from '@fm-synth/synthesis/fragment-parser'
import { describe, expect, it } from 'vitest'

describe('parseFragment (json)', () => {
  it('isolates a payload wrapped in <solution> tags and prose', () => {
    const raw = [
      'Here is the model:',
      '<solution>',
      '{"features":[{"name":"Editor","parent":null},{"name":"Spell Check","parent":"Editor","kind":"optional"},{"name":"Light","parent":"Theme","kind":"alternative"}]}',
      '</solution>',
      'Let me know if you need more.',
    ].join('\n')

    expect(parseFragment(raw, 'json')).toEqual({
      ok: true,
      fragment: {
        features: [
          { name: 'Editor', parent: null },
          { name: 'Spell Check', parent: 'Editor', kind: 'optional' },
          { name: 'Light', parent: 'Theme', kind: 'alternative-group-member' },
        ],
      },
    })
  })

  it('accepts a fenced bare array and short group kinds', () => {
    const raw = '```json\n[{"name":"Editor","parent":null},{"name":"Autosave","parent":"Editor","kind":"or"}]\n```'

    expect(parseFragment(raw, 'json')).toEqual({
      ok: true,
      fragment: {
        features: [
          { name: 'Editor', parent: null },
          { name: 'Autosave', parent: 'Editor', kind: 'or-group-member' },
        ],
      },
    })
  })

  it('treats an empty parent as no parent', () => {
    const outcome = parseFragment('{"features":[{"name":"Editor","parent":""}]}', 'json')

    expect(outcome).toEqual({ ok: true, fragment: { features: [{ name: 'Editor', parent: null }] } })
  })

  it('reports truncated JSON as malformed-syntax', () => {
    const outcome = parseFragment('Sure! {"features": [ {"name": "Editor", ', 'json')

    expect(outcome.ok).toBe(false)
    if (!outcome.ok)
      expect(outcome.failure.reason).toBe('malformed-syntax')
  })

  it('reports a feature without a name as schema-violation', () => {
    const outcome = parseFragment('{"features":[{"parent":"Editor"}]}', 'json')

    expect(outcome.ok).toBe(false)
    if (!outcome.ok)
      expect(outcome.failure.reason).toBe('schema-violation')
  })

  it('reports an unknown kind as schema-violation', () => {
    const outcome = parseFragment('{"features":[{"name":"Editor","parent":null,"kind":"sometimes"}]}', 'json')

    expect(outcome.ok).toBe(false)
    if (!outcome.ok)
      expect(outcome.failure.reason).toBe('schema-violation')
  })

  it('reports blank output as empty-output', () => {
    expect(parseFragment('  \n\t', 'json')).toEqual({
      ok: false,
      failure: { reason: 'empty-output', detail: 'generator returned no text' },
    })
  })
})

describe('parseFragment (featureide-xml)', () => {
  it('derives kinds from group elements and the mandatory attribute', () => {
    const raw = `The model follows.
<featureModel>
  <struct>
    <and name="Editor" mandatory="true">
      <feature name="Spell Check" mandatory="true"/>
      <alt name="Theme">
        <feature name="Light"/>
        <feature name="Dark"/>
      </alt>
    </and>
  </struct>
</featureModel>`

    expect(parseFragment(raw, 'featureide-xml')).toEqual({
      ok: true,
      fragment: {
        features: [
          { name: 'Editor', parent: null },
          { name: 'Spell Check', parent: 'Editor', kind: 'mandatory' },
          { name: 'Theme', parent: 'Editor', kind: 'optional' },
          { name: 'Light', parent: 'Theme', kind: 'alternative-group-member' },
          { name: 'Dark', parent: 'Theme', kind: 'alternative-group-member' },
        ],
      },
    })
  })

  it('wraps a bare <struct> element', () => {
    const outcome = parseFragment('<struct><and name="Editor"><feature name="Autosave"/></and></struct>', 'featureide-xml')

    expect(outcome).toEqual({
      ok: true,
      fragment: {
        features: [
          { name: 'Editor', parent: null },
          { name: 'Autosave', parent: 'Editor', kind: 'optional' },
        ],
      },
    })
  })

  it('reports unbalanced tags as malformed-syntax', () => {
    const outcome = parseFragment('<featureModel><struct><and name="Editor"></struct></featureModel>', 'featureide-xml')

    expect(outcome.ok).toBe(false)
    if (!outcome.ok)
      expect(outcome.failure.reason).toBe('malformed-syntax')
  })

  it('reports prose without a model as malformed-syntax', () => {
    const outcome = parseFragment('I could not find any features.', 'featureide-xml')

    expect(outcome).toEqual({
      ok: false,
      failure: { reason: 'malformed-syntax', detail: 'no <featureModel> or <struct> element found' },
    })
  })

  it('reports a model without <struct> as schema-violation', () => {
    const outcome = parseFragment('<featureModel><properties/></featureModel>', 'featureide-xml')

    expect(outcome).toEqual({
      ok: false,
      failure: { reason: 'schema-violation', detail: '<featureModel> has no <struct> element' },
    })
  })

  it('reports a nameless feature element as schema-violation', () => {
    const outcome = parseFragment('<featureModel><struct><and name="Editor"><feature/></and></struct></featureModel>', 'featureide-xml')

    expect(outcome).toEqual({
      ok: false,
      failure: { reason: 'schema-violation', detail: '/featureModel/struct/and[0]/feature[0]: missing name attribute' },
    })
  })
})
