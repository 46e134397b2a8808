import { existsSync } from 'fs';
import { join } from 'path';
import { VIEWS_DIR } from '../src/app.setup';

describe('VIEWS_DIR', () => {
  it('should point at the templates regardless of the working directory', () => {
    expect(VIEWS_DIR).toBe(join(__dirname, '..', 'views'));
    expect(existsSync(join(VIEWS_DIR, 'layout.hbs'))).toBe(true);
  });
});
