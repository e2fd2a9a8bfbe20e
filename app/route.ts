export const dynamic = "force-dynamic";

export async function GET() {
  return new Response("Hello from Topic & Skill Service!", {
    status: 200,
    headers: { "Content-Type": "text/plain; charset=utf-8" },
  });
}
