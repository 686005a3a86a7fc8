import AuthForm from "@/components/auth/AuthForm";
import Header from "@/components/layout/Header";

export default function RegisterPage() {
  return (
    <div className="mx-auto max-w-md px-4 py-8">
      <Header />
      <AuthForm mode="register" />
    </div>
  );
}
