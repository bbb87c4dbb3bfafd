import { program } from '../../src/cli.js';

describe('program', () => {
  it('should register every command', () => {
    expect(program.commands.map((command) => command.name())).toEqual([
      'scan',
      'plan',
      'apply',
      'toggle-spec',
      'branches',
    ]);
  });

  it('should require language and mode for plan', () => {
    const plan = program.commands.find((command) => command.name() === 'plan');
    const required = plan?.options.filter((option) => option.mandatory).map((option) => option.long);
    expect(required).toEqual(['--language', '--mode']);
  });
});
