import { describe, it, expect } from 'vitest';
import { assertTemplatePlaceholders, injectTemplate, inspectTemplate } from '../template/inject.js';

describe('injectTemplate', () => {
  it('should substitute title and slides', () => {
    const template = '<title>{{ slide_title }}</title><div class="slides">{{slides}}</div>';

    expect(injectTemplate(template, { title: 'Talk', slides: '<section>x</section>' })).toBe(
      '<title>Talk</title><div class="slides"><section>x</section></div>'
    );
  });

  it('should replace every occurrence', () => {
    expect(injectTemplate('{{ slide_title }}|{{ slides }}|{{ slide_title }}', { title: 'T', slides: 'S' })).toBe(
      'T|S|T'
    );
  });

  it('should insert values verbatim', () => {
    expect(injectTemplate('{{ slides }}', { title: '', slides: "cost: $& and $1 and {{ slide_title }}" })).toBe(
      'cost: $& and $1 and {{ slide_title }}'
    );
  });

  it('should leave other template content untouched', () => {
    const template = '{{ other }} {% raw %} {{ slides }}';

    expect(injectTemplate(template, { title: 'T', slides: 'S' })).toBe('{{ other }} {% raw %} S');
  });

  it('should fail without a slides placeholder', () => {
    let caught: unknown;
    try {
      injectTemplate('<html>{{ slide_title }}</html>', { title: 'T', slides: '' }, 'tpl.html');
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      code: 'DECK_TEMPLATE_MISSING_PLACEHOLDER',
      message: 'Template tpl.html has no {{ slides }} placeholder',
    });
  });
});

describe('inspectTemplate', () => {
  it('should report which placeholders exist', () => {
    expect(inspectTemplate('{{ slides }}')).toEqual({ title: false, slides: true });
    expect(assertTemplatePlaceholders('{{slide_title}} {{ slides }}')).toEqual({ title: true, slides: true });
  });
});
