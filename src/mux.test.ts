import { expect } from 'chai'
import { ServeMux, pathValue, setPathValue } from './mux'
import { client, exchange, ok } from './index.test'

describe('ServeMux', () => {

  let mux: ServeMux

  beforeEach('instantiate a new mux', () => (mux = new ServeMux()))

  describe('handle(pattern, handler)', () => {

    it('throws on invalid patterns', () => {
      expect(() => mux.handle('api/foo', ok())).to.throw(Error, 'invalid pattern api/foo')
    })

    it('replaces a pattern registered twice', async () => {
      mux.handle('/foo', ok('first'))
      mux.handle('/foo', ok('second'))
      await client(mux.serve)
        .get('/foo')
        .expect(200, 'second')
    })

    it('replaces a pattern of the same shape under other wildcard names', async () => {
      mux.handle('/users/{id}', (req, res) => void res.end(`id=${pathValue(req, 'id')}`))
      mux.handle('/users/{name}', (req, res) => void res.end(`name=${pathValue(req, 'name')}`))
      await client(mux.serve)
        .get('/users/ada')
        .expect(200, 'name=ada')
    })

  })

  describe('serve(req, res)', () => {

    describe('static routes', () => {

      it('hits a static route', async () => {
        mux.handle('/foo', ok('a'))
        await client(mux.serve)
          .get('/foo')
          .expect(200, 'a')
      })

      it('does not find routes for partial matches', async () => {
        mux.handle('/foo/bar/baz', ok())
        await client(mux.serve)
          .get('/foo/bar')
          .expect(404, '404 page not found\n')
      })

    })

    describe('wildcards', () => {

      it('records single-segment wildcard values', async () => {
        mux.handle('GET /foo/{bar}/baz/{qux}', (req, res) => {
          res.end(pathValue(req, 'bar') + pathValue(req, 'qux'))
        })
        await client(mux.serve)
          .get('/foo/1/baz/2')
          .expect(200, '12')
      })

      it('records the rest of the path for a multi-segment wildcard', async () => {
        mux.handle('/files/{path...}', (req, res) => void res.end(pathValue(req, 'path')))
        await client(mux.serve)
          .get('/files/css/site.css')
          .expect(200, 'css/site.css')
      })

      it('unescapes wildcard values', async () => {
        mux.handle('/tags/{tag}', (req, res) => void res.end(pathValue(req, 'tag')))
        await client(mux.serve)
          .get('/tags/a%20b')
          .expect(200, 'a b')
      })

      it('hits a static route before a wildcard', async () => {
        mux.handle('/foo/{bar}', ok('a'))
        mux.handle('/foo/bar', ok('b'))
        await client(mux.serve)
          .get('/foo/bar')
          .expect(200, 'b')
      })

      it('hits a single-segment wildcard before a multi-segment one', async () => {
        mux.handle('/foo/{rest...}', ok('a'))
        mux.handle('/foo/{bar}', ok('b'))
        await client(mux.serve)
          .get('/foo/bar')
          .expect(200, 'b')
      })

      it('falls back to a multi-segment wildcard after exhausting the others', async () => {
        mux.handle('/foo/{bar}/qux', ok('a'))
        mux.handle('/foo/{rest...}', (req, res) => void res.end(pathValue(req, 'rest')))
        await client(mux.serve)
          .get('/foo/bar/baz')
          .expect(200, 'bar/baz')
      })

    })

    describe('subtrees', () => {

      it('serves everything beneath a pattern ending in a slash', async () => {
        mux.handle('/static/', ok('static'))
        await client(mux.serve)
          .get('/static/css/site.css')
          .expect(200, 'static')
      })

      it('prefers the longest subtree', async () => {
        mux.handle('/', ok('root'))
        mux.handle('/api/', ok('api'))
        await client(mux.serve)
          .get('/api/users')
          .expect(200, 'api')
      })

      it('redirects a subtree root without its slash', async () => {
        mux.handle('/static/', ok())
        await client(mux.serve)
          .get('/static')
          .expect('Location', '/static/')
          .expect(301, '<a href="/static/">Moved Permanently</a>.\n\n')
      })

      it('keeps the query string when redirecting', async () => {
        mux.handle('/static/', ok())
        await client(mux.serve)
          .get('/static?v=1')
          .expect('Location', '/static/?v=1')
          .expect(301)
      })

      it('matches {$} only at the trailing slash', async () => {
        mux.handle('/{$}', ok('home'))
        await client(mux.serve)
          .get('/')
          .expect(200, 'home')
        await client(mux.serve)
          .get('/other')
          .expect(404)
      })

    })

    describe('methods', () => {

      it('answers HEAD with a GET route', async () => {
        mux.handle('GET /foo', ok())
        await client(mux.serve)
          .head('/foo')
          .expect(200)
      })

      it('prefers a route naming the method', async () => {
        mux.handle('/foo', ok('any'))
        mux.handle('POST /foo', ok('post'))
        await client(mux.serve)
          .post('/foo')
          .expect(200, 'post')
        await client(mux.serve)
          .get('/foo')
          .expect(200, 'any')
      })

      it('answers 405 with the allowed methods', async () => {
        mux.handle('GET /items', ok())
        mux.handle('DELETE /items', ok())
        await client(mux.serve)
          .post('/items')
          .expect('Allow', 'DELETE, GET, HEAD')
          .expect(405, 'Method Not Allowed\n')
      })

    })

  })

  describe('setPathValue(req, name, value)', () => {

    it('overrides a matched value', async () => {
      mux.handle('/users/{id}', (req, res) => {
        setPathValue(req, 'id', 'me')
        res.end(pathValue(req, 'id'))
      })
      await client(mux.serve)
        .get('/users/7')
        .expect(200, 'me')
    })

    it('sets a value on a request that was never served', () => {
      const { req } = exchange('GET', '/')
      setPathValue(req, 'id', '1')
      expect(pathValue(req, 'id')).to.equal('1')
    })

  })

  describe('resolve(req)', () => {

    it('reports the matched pattern without serving', () => {
      mux.handle('GET /users/{id}', ok())
      const { req } = exchange('GET', '/users/7')
      expect(mux.resolve(req)).to.include({ pattern: 'GET /users/{id}' })
      expect(pathValue(req, 'id')).to.equal('')
    })

    it('reports an empty pattern when nothing matches', () => {
      mux.handle('GET /users', ok())
      expect(mux.resolve(exchange('GET', '/posts').req).pattern).to.equal('')
      expect(mux.resolve(exchange('POST', '/users').req).pattern).to.equal('')
    })

    it('reports the slashed path for a subtree redirect', () => {
      mux.handle('/static/', ok())
      expect(mux.resolve(exchange('GET', '/static').req).pattern).to.equal('/static/')
    })

    it('matches an absolute-form target by its path', () => {
      mux.handle('GET /foo', ok())
      expect(mux.resolve(exchange('GET', 'http://example.com/foo').req).pattern).to.equal('GET /foo')
    })

    it('redirects an absolute-form subtree root to its slashed path', () => {
      mux.handle('/static/', ok())
      const { req, res } = exchange('GET', 'http://example.com/static?v=1')
      void mux.resolve(req).handler(req, res)
      expect(res.statusCode).to.equal(301)
      expect(res.getHeader('Location')).to.equal('/static/?v=1')
    })

    it('redirects unclean paths to their clean form', () => {
      mux.handle('/a/b', ok())
      const { req, res } = exchange('GET', '/a//x/../b?q=1')
      const { handler, pattern } = mux.resolve(req)
      void handler(req, res)
      expect(pattern).to.equal('/a/b')
      expect(res.statusCode).to.equal(301)
      expect(res.getHeader('Location')).to.equal('/a/b?q=1')
    })

  })

})
