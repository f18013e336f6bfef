import { describe, it, expect } from 'vitest';
import { TrackInfo } from '../TrackInfo.js';

describe('TrackInfo', () => {
  it('should split artist and title on the first separator', () => {
    expect(new TrackInfo(0, 0, 'Led Zeppelin - Kashmir').artistTitle()).toEqual({
      kind: 'artist-title',
      artist: 'Led Zeppelin',
      title: 'Kashmir',
    });
    expect(new TrackInfo(0, 0, 'A - B - C').artistTitle()).toEqual({ kind: 'artist-title', artist: 'A', title: 'B - C' });
  });

  it('should treat a name without separator as a bare title', () => {
    expect(new TrackInfo(0, 0, 'Station Jingle').artistTitle()).toEqual({
      kind: 'title-only',
      artist: '',
      title: 'Station Jingle',
    });
    expect(new TrackInfo(0, 0, 'Jay-Z').artistTitle().kind).toBe('title-only');
    expect(new TrackInfo(0, 0, '').artistTitle()).toEqual({ kind: 'title-only', artist: '', title: '' });
  });

  it('should format the elapsed time without padding the hours', () => {
    expect(new TrackInfo(0, 0, 'x').timePosString()).toBe('0:00:00');
    expect(new TrackInfo(0, 3661.9, 'x').timePosString()).toBe('1:01:01');
    expect(new TrackInfo(0, 36000, 'x').timePosString()).toBe('10:00:00');
  });

  it('should build from stream metadata', () => {
    const track = TrackInfo.fromMetadata(4096, 12.5, {
      streamtitle: 'Artist - Title',
      streamurl: 'http://img.example.com/cover.jpg',
    });

    expect(track.filePos).toBe(4096);
    expect(track.timePos).toBe(12.5);
    expect(track.name).toBe('Artist - Title');
    expect(track.cover).toBe('http://img.example.com/cover.jpg');
    expect(TrackInfo.fromMetadata(0, 0, {}).name).toBe('');
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(new TrackInfo(0, 0, 'x'))).toBe(true);
  });
});
