import { Request, Response } from 'express';
import { FLASH_COOKIE, flash, takeFlash } from './flash';

const fakeResponse = () => {
  const res = {
    locals: {},
    cookie: jest.fn(),
    clearCookie: jest.fn(),
  };
  return { res, asResponse: res as unknown as Response };
};

const fakeRequest = (signedCookies: Record<string, unknown>) => ({ signedCookies }) as unknown as Request;

describe('flash', () => {
  it('should queue notices in a signed cookie', () => {
    const { res, asResponse } = fakeResponse();

    flash(asResponse, 'error', 'First');
    flash(asResponse, 'success', 'Second');

    expect(res.cookie).toHaveBeenLastCalledWith(
      FLASH_COOKIE,
      [
        { category: 'error', message: 'First' },
        { category: 'success', message: 'Second' },
      ],
      { signed: true, httpOnly: true, sameSite: 'lax' },
    );
  });
});

describe('takeFlash', () => {
  it('should return stored notices and clear the cookie', () => {
    const { res, asResponse } = fakeResponse();
    const req = fakeRequest({ [FLASH_COOKIE]: [{ category: 'success', message: 'Saved' }] });

    expect(takeFlash(req, asResponse)).toEqual([{ category: 'success', message: 'Saved' }]);
    expect(res.clearCookie).toHaveBeenCalledWith(FLASH_COOKIE);
  });

  it('should leave the response alone without a cookie', () => {
    const { res, asResponse } = fakeResponse();

    expect(takeFlash(fakeRequest({}), asResponse)).toEqual([]);
    expect(res.clearCookie).not.toHaveBeenCalled();
  });

  it('should drop a tampered or malformed cookie', () => {
    const { asResponse } = fakeResponse();

    expect(takeFlash(fakeRequest({ [FLASH_COOKIE]: false }), asResponse)).toEqual([]);
    expect(
      takeFlash(fakeRequest({ [FLASH_COOKIE]: [{ category: 'info', message: 'x' }, 'text'] }), asResponse),
    ).toEqual([]);
  });
});
