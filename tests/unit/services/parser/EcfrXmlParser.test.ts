import { describe, it, expect } from 'vitest';
import { EcfrXmlParser } from '../../../../src/services/parser/EcfrXmlParser.js';
import { ParseError } from '../../../../src/lib/errors.js';
import type { RegulationDocument } from '../../../../src/models/regulation-document.js';
import { readFixture } from '../../../helpers/pipeline-test-helper.js';

describe('EcfrXmlParser Unit Tests', () => {
  const parser = new EcfrXmlParser();

  describe('fixture part', () => {
    const document: RegulationDocument = parser
      .parse(readFixture('ecfr/part-11-excerpt.xml'), 'title-21-part-11')
      ._unsafeUnwrap();

    it('should take the title from the part heading', () => {
      expect(document.corpusId).toBe('title-21-part-11');
      expect(document.title).toBe('PART 11—ELECTRONIC RECORDS; ELECTRONIC SIGNATURES');
      expect(document.text.startsWith('PART 11—ELECTRONIC RECORDS; ELECTRONIC SIGNATURES\n\nAuthority:')).toBe(true);
    });

    it('should record every section in document order', () => {
      expect(document.sections.map((section) => section.id)).toEqual(['§ 11.1', '§ 11.10', '§ 11.50']);
      expect(document.sections.map((section) => section.heading)).toEqual([
        '§ 11.1 Scope.',
        '§ 11.10 Controls for closed systems.',
        '§ 11.50 Signature manifestations.',
      ]);
    });

    it('should point section spans at their text', () => {
      for (const section of document.sections) {
        expect(document.text.slice(section.offset, section.offset + section.heading.length)).toBe(section.heading);
      }

      const closedSystems = document.sections[1];
      const span = document.text.slice(
        closedSystems?.offset ?? 0,
        (closedSystems?.offset ?? 0) + (closedSystems?.length ?? 0)
      );
      expect(span).toBe(
        '§ 11.10 Controls for closed systems.\n\n' +
          'Closed systems shall employ procedures and controls designed to ensure the authenticity, integrity, ' +
          'and, when appropriate, the confidentiality of electronic records.\n\n' +
          '(e) Use of secure, computer-generated, time-stamped audit trails to independently record the date ' +
          'and time of operator entries and actions that create, modify, or delete electronic records.'
      );
    });

    it('should flatten inline markup and decode entities', () => {
      expect(document.text).toContain('clearly indicates the printed name of the signer.');
      expect(document.text).toContain('considered trustworthy & reliable.');
    });

    it('should separate blocks with blank lines', () => {
      expect(document.text).toContain('Subpart B—Electronic Records\n\n§ 11.10 Controls for closed systems.');
    });
  });

  it('should name a section from its heading when N is missing', () => {
    const xml = '<DIV5 TYPE="PART"><DIV8 TYPE="SECTION"><HEAD>§ 11.3 Definitions.</HEAD><P>Terms.</P></DIV8></DIV5>';
    const document = parser.parse(xml, 'title-21-part-11')._unsafeUnwrap();

    expect(document.sections).toEqual([
      { id: '§ 11.3', heading: '§ 11.3 Definitions.', offset: 0, length: '§ 11.3 Definitions.\n\nTerms.'.length },
    ]);
  });

  it('should reject an empty payload', () => {
    const error = parser.parse('  \n', 'title-21-part-11')._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe('Regulatory source payload is empty');
    expect(error.stage).toBe('ingest');
  });

  it('should reject malformed XML', () => {
    const error = parser.parse('<DIV5><P>unclosed</DIV5>', 'title-21-part-11')._unsafeUnwrapErr();
    expect(error.message.startsWith('Malformed regulatory XML at line 1:')).toBe(true);
  });

  it('should reject XML without readable text', () => {
    const error = parser.parse('<DIV5 TYPE="PART"><PRTPAGE P="1"/></DIV5>', 'title-21-part-11')._unsafeUnwrapErr();
    expect(error.message).toBe('Regulatory XML contained no readable text');
  });
});
