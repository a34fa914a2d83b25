import { describe, it, expect, vi } from 'vitest';
import { parseCommand } from '../commands.js';
import { MsgType, OptionTarget } from '../enums.js';
import { CommandSyntaxError } from '../errors.js';

describe('parseCommand', () => {
  it('should return null for blank input', () => {
    expect(parseCommand('alice', '')).toBeNull();
    expect(parseCommand('alice', '   \t ')).toBeNull();
  });

  it('should send anything that is not a command as text', () => {
    const msg = parseCommand('alice', 'hello there');
    expect(msg).toMatchObject({ msgType: MsgType.TEXT, username: 'alice', text: 'hello there' });
  });

  it('should build help, logout and list users messages', () => {
    expect(parseCommand('alice', 'HELP')).toMatchObject({ msgType: MsgType.HELP });
    expect(parseCommand('alice', 'logout')).toMatchObject({ msgType: MsgType.LOGOUT });
    expect(parseCommand('alice', 'list users')).toMatchObject({ msgType: MsgType.LIST_USERS });
  });

  it('should build login messages from the first argument', () => {
    expect(parseCommand('alice', 'login ecila')).toMatchObject({
      msgType: MsgType.LOGIN,
      username: 'alice',
      password: 'ecila',
    });
  });

  it('should fall back to text for malformed commands', () => {
    expect(parseCommand('alice', 'list')).toMatchObject({ msgType: MsgType.TEXT, text: 'list' });
    expect(parseCommand('alice', 'login')).toMatchObject({ msgType: MsgType.TEXT, text: 'login' });
    expect(parseCommand('alice', 'option')).toMatchObject({ msgType: MsgType.TEXT, text: 'option' });
    expect(parseCommand('alice', 'option colour blue')).toMatchObject({
      msgType: MsgType.TEXT,
      text: 'option colour blue',
    });
  });

  describe('option', () => {
    it('should build a query when no value is given', () => {
      expect(parseCommand('alice', 'option cipher_name')).toMatchObject({
        msgType: MsgType.OPTION,
        target: OptionTarget.CIPHER_NAME,
        value: null,
      });
    });

    it('should keep the rest of the line as the value', () => {
      expect(parseCommand('alice', 'OPTION CIPHER_KEY James T. Kirk')).toMatchObject({
        msgType: MsgType.OPTION,
        target: OptionTarget.CIPHER_KEY,
        value: 'James T. Kirk',
      });
    });
  });

  describe('send file', () => {
    it('should read the file and keep its base name', () => {
      const readFile = vi.fn(() => 'file body');

      const msg = parseCommand('alice', 'send file /tmp/notes.txt', { readFile });

      expect(readFile).toHaveBeenCalledWith('/tmp/notes.txt');
      expect(msg).toMatchObject({
        msgType: MsgType.FILE,
        fileName: 'notes.txt',
        fileContents: 'file body',
      });
    });

    it('should save under the name given after AS', () => {
      const msg = parseCommand('alice', 'SEND FILE a.txt AS b.txt', { readFile: () => 'x' });
      expect(msg).toMatchObject({ msgType: MsgType.FILE, fileName: 'b.txt' });
    });

    it('should reject malformed SEND syntax', () => {
      const readFile = () => 'x';
      expect(() => parseCommand('alice', 'send', { readFile })).toThrow('Invalid SEND FILE syntax');
      expect(() => parseCommand('alice', 'send a.txt', { readFile })).toThrow(
        'Invalid SEND FILE syntax'
      );
      expect(() => parseCommand('alice', 'send file a.txt to b.txt', { readFile })).toThrow(
        CommandSyntaxError
      );
    });

    it('should report unreadable files', () => {
      const readFile = () => {
        throw new Error('ENOENT');
      };
      expect(() => parseCommand('alice', 'send file missing.txt', { readFile })).toThrow(
        'File not found or not readable'
      );
    });

    it('should refuse file transfer without a reader', () => {
      expect(() => parseCommand('alice', 'send file a.txt')).toThrow('File transfer is not available');
    });
  });
});
