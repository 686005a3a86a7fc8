import AuthForm from "@/components/auth/AuthForm";
import Header from "@/components/layout/Header";
import Notice, { noticeFor } from "@/components/layout/Notice";

export default function LoginPage({
  searchParams,
}: {
  searchParams: { [key: string]: string | string[] | undefined };
}) {
  const notice = noticeFor(searchParams.notice);
  return (
    <div className="mx-auto max-w-md px-4 py-8">
      <Header />
      {notice && <Notice {...notice} />}
      <AuthForm mode="login" />
    </div>
  );
}
