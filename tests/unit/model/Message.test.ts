import { describe, it, expect } from '@jest/globals';
import { Message } from '../../../src/model/Message.js';
import { Segment } from '../../../src/model/Segment.js';

function sampleMessage(): Message {
  const message = new Message();
  message
    .add('MSH')
    .setText(1, '|')
    .setText(2, '^~\\&')
    .setComponents(9, ['ADT', 'A01', 'ADT_A01'])
    .setText(10, 'CTRL0001')
    .setText(12, '2.5');
  message.add('PID').setComponents(5, ['Smith', 'John']);
  message.add('OBX').setText(1, '1');
  message.add('OBX').setText(1, '2');
  return message;
}

describe('Message', () => {
  it('should keep segments in insertion order', () => {
    const message = sampleMessage();
    expect(message.getSegments().map((s) => s.getCode())).toEqual(['MSH', 'PID', 'OBX', 'OBX']);
    expect(message.getSegmentCount()).toBe(4);
  });

  it('should find segments by code and occurrence', () => {
    const message = sampleMessage();
    expect(message.getSegment('OBX', 2)?.getText(1)).toBe('2');
    expect(message.getSegment('OBX', 3)).toBeUndefined();
    expect(message.getAllSegments('OBX')).toHaveLength(2);
  });

  it('should read header values', () => {
    const message = sampleMessage();
    expect(message.getMessageType()).toEqual({ code: 'ADT', triggerEvent: 'A01', structure: 'ADT_A01' });
    expect(message.getControlId()).toBe('CTRL0001');
    expect(message.getVersion()).toBe('2.5');
  });

  it('should omit the structure when MSH-9.3 is empty', () => {
    const message = new Message();
    message.add('MSH').setComponents(9, ['ORU', 'R01']);
    expect(message.getMessageType()).toEqual({ code: 'ORU', triggerEvent: 'R01' });
  });

  it('should have no message type without a header', () => {
    const message = new Message();
    message.add('PID');
    expect(message.getMessageType()).toBeUndefined();
    expect(message.getControlId()).toBe('');
    expect(message.isStructurallyValid()).toBe(false);
  });

  it('should insert and remove segments', () => {
    const message = sampleMessage();
    message.insertSegment(1, new Segment('EVN'));
    expect(message.getSegmentAt(1)?.getCode()).toBe('EVN');
    const removed = message.removeSegment(1);
    expect(removed.getCode()).toBe('EVN');
    expect(() => message.removeSegment(10)).toThrow(RangeError);
    expect(() => message.insertSegment(9, new Segment('EVN'))).toThrow(RangeError);
  });

  it('should clone deeply and compare field for field', () => {
    const message = sampleMessage();
    const copy = message.clone();
    expect(copy.equals(message)).toBe(true);
    copy.getSegment('PID')?.setText(5, 'Doe');
    expect(copy.equals(message)).toBe(false);
    expect(message.getSegment('PID')?.getText(5, 1)).toBe('Smith');
  });

  it('should be structurally valid when MSH is first', () => {
    expect(sampleMessage().isStructurallyValid()).toBe(true);
  });
});
