// routes/health.ts
import Router from 'koa-router';

const router = new Router();

// Liveness only: answers OK whenever the process can serve HTTP, whatever
// the health registry says.
router.get('/health', (ctx) => {
  ctx.status = 200;
  ctx.type = 'text/plain';
  ctx.body = 'OK';
});

export default router;
