import { describe, it, expect } from 'vitest';
import { GPX_NAMESPACE, decodeGpxBytes, loadGpxDocument } from './gpx-document.js';
import { GpxParseError, InvalidGpxDataError, NoTracksError } from './errors.js';

const SAMPLE_GPX = `<?xml version="1.0" encoding="UTF-8"?>
<gpx xmlns="http://www.topografix.com/GPX/1/0" version="1.0" creator="Test Logger">
  <wpt lat="1.5" lon="2.5"><name>Camp</name></wpt>
  <trk>
    <name>Loop</name>
    <trkseg>
      <trkpt lat="10.0" lon="20.0"><time>2024-01-01T10:00:00Z</time></trkpt>
      <trkpt lat="10.1" lon="20.1"><ele>5</ele></trkpt>
    </trkseg>
    <trkseg>
      <trkpt lat="10.2" lon="20.2"><time>2024-01-01T11:00:00Z</time></trkpt>
    </trkseg>
  </trk>
  <trk>
    <trkseg></trkseg>
  </trk>
</gpx>
`;

function gpxWith(body: string, rootAttributes = 'version="1.0"'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<gpx xmlns="${GPX_NAMESPACE}" ${rootAttributes}>
${body}
</gpx>
`;
}

describe('loadGpxDocument', () => {
  it('should expose root tag, version and creator', () => {
    const doc = loadGpxDocument(SAMPLE_GPX);

    expect(doc.rootTag()).toBe('{http://www.topografix.com/GPX/1/0}gpx');
    expect(doc.version()).toBe('1.0');
    expect(doc.creator()).toBe('Test Logger');
  });

  it('should find tracks in document order', () => {
    const tracks = loadGpxDocument(SAMPLE_GPX).findTracks();

    expect(tracks).toHaveLength(2);
    expect(tracks[0].name()).toBe('Loop');
    expect(tracks[1].name()).toBeNull();
  });

  it('should flatten points across segments', () => {
    const [track] = loadGpxDocument(SAMPLE_GPX).findTracks();
    const points = track.points();

    expect(points).toHaveLength(3);
    expect(points[0]).toEqual({ lat: '10.0', lon: '20.0', time: '2024-01-01T10:00:00Z' });
    expect(points[1]).toEqual({ lat: '10.1', lon: '20.1', time: null });
    expect(points[2]).toEqual({ lat: '10.2', lon: '20.2', time: '2024-01-01T11:00:00Z' });
  });

  it('should report missing coordinates as null', () => {
    const doc = loadGpxDocument(gpxWith('<trk><trkseg><trkpt lon="3"></trkpt></trkseg></trk>'));
    expect(doc.findTracks()[0].points()).toEqual([{ lat: null, lon: '3', time: null }]);
  });

  it('should ignore a leading byte order mark', () => {
    const doc = loadGpxDocument('\uFEFF' + SAMPLE_GPX);
    expect(doc.findTracks()).toHaveLength(2);
  });

  it('should decode bytes in the encoding the declaration names', () => {
    const bytes = Buffer.from(
      `<?xml version="1.0" encoding="ISO-8859-1"?>\n<gpx xmlns="${GPX_NAMESPACE}" version="1.0"><trk><name>Caf\xE9</name></trk></gpx>`,
      'latin1'
    );

    expect(loadGpxDocument(bytes).findTracks()[0].name()).toBe('Caf\u00E9');
  });

  it('should decode UTF-8 bytes without a declaration', () => {
    const bytes = Buffer.from(`<gpx xmlns="${GPX_NAMESPACE}" version="1.0"><trk><name>Caf\u00E9</name></trk></gpx>`, 'utf-8');
    expect(loadGpxDocument(bytes).findTracks()[0].name()).toBe('Caf\u00E9');
  });

  it('should let a byte order mark decide the encoding', () => {
    const bytes = Buffer.concat([
      Buffer.from([0xff, 0xfe]),
      Buffer.from('<?xml version="1.0" encoding="UTF-16"?><gpx version="1.0"/>', 'utf16le'),
    ]);
    expect(decodeGpxBytes(bytes)).toBe('<?xml version="1.0" encoding="UTF-16"?><gpx version="1.0"/>');
  });

  it('should reject an unknown encoding', () => {
    const bytes = Buffer.from('<?xml version="1.0" encoding="x-no-such-charset"?><gpx version="1.0"/>');

    expect(() => decodeGpxBytes(bytes)).toThrow(GpxParseError);
    expect(() => decodeGpxBytes(bytes)).toThrow("unsupported encoding `x-no-such-charset'");
  });

  it('should reject bytes that are invalid in the detected encoding', () => {
    const bytes = Buffer.from([...Buffer.from('<gpx version="1.0">'), 0xe9, ...Buffer.from('</gpx>')]);
    expect(() => decodeGpxBytes(bytes)).toThrow('invalid utf-8 byte sequence');
  });

  it('should throw GpxParseError for malformed XML', () => {
    expect(() => loadGpxDocument('<gpx version="1.0"><trk></gpx>')).toThrow(GpxParseError);
  });

  it('should only see elements in the GPX 1.0 namespace', () => {
    const xml = `<gpx xmlns="http://www.topografix.com/GPX/1/1" version="1.0"><trk></trk></gpx>`;
    expect(loadGpxDocument(xml).findTracks()).toHaveLength(0);
  });

  it('should honour an explicit namespace option', () => {
    const xml = `<gpx xmlns="urn:example:tracks" version="1.0"><trk></trk></gpx>`;
    const doc = loadGpxDocument(xml, { namespace: 'urn:example:tracks' });
    expect(doc.findTracks()).toHaveLength(1);
  });
});

describe('GpxDocument.validate', () => {
  it('should accept a GPX 1.0 document with tracks', () => {
    expect(() => loadGpxDocument(SAMPLE_GPX).validate('sample.gpx')).not.toThrow();
  });

  it('should reject a missing version', () => {
    const doc = loadGpxDocument(gpxWith('<trk></trk>', 'creator="x"'));
    expect(() => doc.validate('a.gpx')).toThrow("File `a.gpx' does not appear to be a valid GPX file!");
  });

  it('should reject a root in another namespace', () => {
    const doc = loadGpxDocument('<gpx xmlns="http://www.topografix.com/GPX/1/1" version="1.0"/>');
    expect(() => doc.validate('a.gpx')).toThrow(InvalidGpxDataError);
  });

  it('should reject other GPX versions with exit code 4', () => {
    const doc = loadGpxDocument(gpxWith('<trk></trk>', 'version="1.1"'));

    try {
      doc.validate('a.gpx');
      expect.unreachable('validate should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGpxDataError);
      expect(error).toHaveProperty('exitCode', 4);
      expect(error).toHaveProperty('message', "File `a.gpx' has unsupported GPX version 1.1 (need: 1.0).");
    }
  });

  it('should reject documents without tracks with exit code 5', () => {
    const doc = loadGpxDocument(gpxWith('<wpt lat="1" lon="2"></wpt>'));

    expect(() => doc.validate('a.gpx')).toThrow(NoTracksError);
    expect(() => doc.validate('a.gpx')).toThrow("No <trk> elements found in file `a.gpx'!");
    expect(new NoTracksError('none').exitCode).toBe(5);
  });
});

describe('GpxDocument.serialize', () => {
  it('should write an XML declaration and keep the default namespace', () => {
    const output = loadGpxDocument(SAMPLE_GPX).serialize();

    expect(output.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<gpx xmlns="http://www.topografix.com/GPX/1/0" version="1.0" creator="Test Logger">')).toBe(true);
  });

  it('should reproduce an unmodified document', () => {
    const xml = gpxWith('  <trk>\n    <name>A &amp; B</name>\n  </trk>');
    expect(loadGpxDocument(xml).serialize()).toBe(xml);
  });

  it('should keep top-level comments on their own line', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>\n<!-- recorded on device -->\n<gpx xmlns="${GPX_NAMESPACE}" version="1.0"><trk><name>x</name></trk></gpx>\n`;
    expect(loadGpxDocument(xml).serialize()).toBe(xml);
  });

  it('should preserve tracks, points and attributes on a round trip', () => {
    const original = loadGpxDocument(SAMPLE_GPX);
    const reparsed = loadGpxDocument(original.serialize());

    expect(reparsed.creator()).toBe('Test Logger');
    expect(reparsed.findTracks()).toHaveLength(2);
    expect(reparsed.findTracks()[0].points()).toEqual(original.findTracks()[0].points());
    expect(reparsed.findTracks()[1].points()).toHaveLength(0);
    expect(reparsed.serialize()).toContain('<wpt lat="1.5" lon="2.5"><name>Camp</name></wpt>');
  });
});

describe('GpxTrackHandle', () => {
  it('should return the existing description element', () => {
    const doc = loadGpxDocument(gpxWith('<trk><desc>old</desc></trk>'));
    const desc = doc.findTracks()[0].getOrCreateDescription();
    expect(desc.textContent).toBe('old');
  });

  it('should insert a new description after the name, indented like its siblings', () => {
    const doc = loadGpxDocument(gpxWith('  <trk>\n    <name>Loop</name>\n    <trkseg></trkseg>\n  </trk>'));
    const [track] = doc.findTracks();

    track.getOrCreateDescription().textContent = 'hi';

    expect(track.description()).toBe('hi');
    expect(doc.serialize()).toContain('<name>Loop</name>\n    <desc>hi</desc>\n    <trkseg');
  });

  it('should insert a new name before everything else', () => {
    const doc = loadGpxDocument(gpxWith('  <trk>\n    <trkseg></trkseg>\n  </trk>'));
    const [track] = doc.findTracks();

    track.getOrCreateName().textContent = 'New';

    expect(track.name()).toBe('New');
    expect(doc.serialize()).toContain('<trk>\n    <name>New</name>\n    <trkseg');
  });

  it('should append after the last child when nothing follows', () => {
    const doc = loadGpxDocument(gpxWith('  <trk>\n    <name>A</name>\n  </trk>'));
    doc.findTracks()[0].getOrCreateDescription().textContent = 'd';

    expect(doc.serialize()).toContain('<name>A</name>\n    <desc>d</desc>\n  </trk>');
  });

  it('should fill an empty track', () => {
    const doc = loadGpxDocument(gpxWith('<trk></trk>'));
    doc.findTracks()[0].getOrCreateDescription().textContent = 'd';

    expect(doc.serialize()).toContain('<trk><desc>d</desc></trk>');
  });

  it('should reuse the prefix of a prefixed document', () => {
    const xml = `<g:gpx xmlns:g="${GPX_NAMESPACE}" version="1.0"><g:trk><g:name>P</g:name></g:trk></g:gpx>`;
    const doc = loadGpxDocument(xml);
    const [track] = doc.findTracks();

    track.getOrCreateDescription().textContent = 'd';

    expect(track.name()).toBe('P');
    expect(doc.serialize()).toContain('<g:name>P</g:name><g:desc>d</g:desc></g:trk>');
  });
});
