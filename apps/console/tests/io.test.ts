import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import test from 'node:test';
import { setImmediate as tick } from 'node:timers/promises';
import { createConsoleIO } from '../src/io.js';

function collect(stream: PassThrough): () => string {
  let written = '';
  stream.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  return () => written;
}

test('answers with typed lines and then null once input ends', async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  const written = collect(output);
  const io = createConsoleIO(input, output);
  input.end('5\n');

  assert.equal(await io.ask('Choose your move (1-9): '), '5');
  assert.equal(await io.ask('Choose your move (1-9): '), null);
  await tick();
  assert.ok(written().startsWith('Choose your move (1-9): '));
  io.close();
});

test('prints lines to the output', async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  const written = collect(output);
  const io = createConsoleIO(input, output);

  io.print('Welcome to Tic Tac Toe!');
  await tick();
  assert.equal(written(), 'Welcome to Tic Tac Toe!\n');
  io.close();
});

test('answers null after being closed', async () => {
  const io = createConsoleIO(new PassThrough(), new PassThrough());
  io.close();
  assert.equal(await io.ask('Choose your move (1-9): '), null);
});
